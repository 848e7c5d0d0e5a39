export * from '@/domain/items/types';
export { normalizeItem, normalizeCatalog, MIN_ITEM_LEVEL, MAX_ITEM_LEVEL } from '@/domain/items/normalize';
export type {
  CatalogIngestReport,
  CatalogIngestResult,
  ItemIngestError,
  ItemIngestErrorCode,
  ItemIngestResult,
} from '@/domain/items/normalize';
export { ItemLookup, createItemLookup, resolveItemNames } from '@/domain/items/item-lookup';
export type { ItemNameResolution, UnresolvedItemName } from '@/domain/items/item-lookup';

export { DEFAULT_CLASS_DATA, createClassDataTable, spellConversionFactor } from '@/domain/class-data/class-data';
export type { ClassData, ClassDataTable, SpellConversionTable, SpellCosts } from '@/domain/class-data/types';

export * from '@/domain/build/types';
export { aggregateBuild } from '@/domain/build/aggregate';
export {
  ATTACK_SPEED_MULTIPLIERS,
  TIER_COST,
  attackSpeedMultiplier,
  computeBuildCost,
  computeDamageBreakdown,
  computeEffectiveHp,
  computeManaSustain,
  computeSpellCosts,
  computeSpellDps,
  deriveBuildStats,
  effectiveHealth,
  itemCost,
  spellCost,
  weaponAverageDamage,
} from '@/domain/build/build-metrics';
export type { DeriveContext } from '@/domain/build/build-metrics';
export {
  DEFAULT_SKILL_POINT_BUDGET,
  checkBuildStructure,
  checkBuildThresholds,
  collectBuildWarnings,
  isValid,
  sumRequirements,
  validateBuild,
} from '@/domain/build/validator';
export type { BuildConstraints, ValidateBuildOptions } from '@/domain/build/validator';

export * from '@/domain/autobuilder/types';
export { buildConfigSchema, parseBuildConfig } from '@/domain/autobuilder/config-schema';
export type { BuildConfigInput } from '@/domain/autobuilder/config-schema';
export {
  PLAYSTYLE_STATS,
  applyElementStage,
  applyItemFilters,
  buildSlotPools,
  elementScore,
  filterByClass,
  filterByLevel,
  filterByTier,
  filterSlotCandidates,
  hasIncludedItem,
  pinnedCategories,
  playstyleScore,
  prioritizeByPlaystyle,
} from '@/domain/autobuilder/slot-filter';
export type { SlotPools } from '@/domain/autobuilder/slot-filter';
export { countCombinations, enumerateBuilds, ringPairs } from '@/domain/autobuilder/combinations';
export type { RingPair } from '@/domain/autobuilder/combinations';
export { defaultScore, scoreCandidate } from '@/domain/autobuilder/scoring';
export type { ScoreOutcome } from '@/domain/autobuilder/scoring';
export { TopNSelector } from '@/domain/autobuilder/top-n';
export type { RankedEntry } from '@/domain/autobuilder/top-n';
export { PROGRESS_INTERVAL, generateBuilds } from '@/domain/autobuilder/generate';

export { BuildConfigError, CatalogPayloadError, ClassDataError } from '@/lib/errors';
export { logger } from '@/lib/logger';
export type { Logger } from '@/lib/logger';
