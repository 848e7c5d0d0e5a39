import type { CatalogSnapshot, ItemCategoryKey } from '@/domain/items/types';
import { ITEM_CATEGORY_KEYS, MANDATORY_CATEGORIES } from '@/domain/items/types';
import { createItemLookup, resolveItemNames } from '@/domain/items/item-lookup';
import { DEFAULT_CLASS_DATA } from '@/domain/class-data/class-data';
import { aggregateBuild } from '@/domain/build/aggregate';
import { deriveBuildStats } from '@/domain/build/build-metrics';
import type { AggregatedStats, Build, DerivedStats, RejectionReason, ScoredBuild } from '@/domain/build/types';
import { checkBuildStructure, checkBuildThresholds, collectBuildWarnings } from '@/domain/build/validator';
import type { BuildConfigInput } from '@/domain/autobuilder/config-schema';
import { parseBuildConfig } from '@/domain/autobuilder/config-schema';
import { buildSlotPools, pinnedCategories } from '@/domain/autobuilder/slot-filter';
import type { SlotPools } from '@/domain/autobuilder/slot-filter';
import { countCombinations, enumerateBuilds } from '@/domain/autobuilder/combinations';
import { scoreCandidate } from '@/domain/autobuilder/scoring';
import { TopNSelector } from '@/domain/autobuilder/top-n';
import type {
  BuildConfig,
  BuildGenerationOptions,
  BuildGenerationResult,
  BuildProgressEvent,
  StopReason,
} from '@/domain/autobuilder/types';
import { childLogger, logger as rootLogger } from '@/lib/logger';
import type { Logger } from '@/lib/logger';

export const PROGRESS_INTERVAL = 2000;

interface Candidate {
  build: Build;
  aggregated: AggregatedStats;
  derived: DerivedStats;
}

function emptyRejections(): Record<RejectionReason, number> {
  return {
    ring_count: 0,
    slot_category: 0,
    weapon_type: 0,
    class_requirement: 0,
    skill_points: 0,
    min_dps: 0,
    min_mana_regen: 0,
    max_cost: 0,
  };
}

function poolSizes(pools: SlotPools): Record<ItemCategoryKey, number> {
  return {
    helmet: pools.helmet.length,
    chestplate: pools.chestplate.length,
    leggings: pools.leggings.length,
    boots: pools.boots.length,
    ring: pools.ring.length,
    bracelet: pools.bracelet.length,
    necklace: pools.necklace.length,
    weapon: pools.weapon.length,
  };
}

function reportUnresolvedNames(catalog: CatalogSnapshot, config: BuildConfig, log: Logger, diagnostics: string[]): void {
  const { includeItems, excludeItems } = config.itemFilters;
  if (includeItems.length === 0 && excludeItems.length === 0) return;
  const lookup = createItemLookup(catalog);
  const lists: Array<[string, string[]]> = [
    ['include', includeItems],
    ['exclude', excludeItems],
  ];
  for (const [label, names] of lists) {
    for (const { name, suggestions } of resolveItemNames(lookup, names).unresolved) {
      const hint = suggestions.length > 0 ? ` Did you mean: ${suggestions.join(', ')}?` : '';
      const message = `Unknown item "${name}" in ${label} list.${hint}`;
      diagnostics.push(message);
      log.warn(message);
    }
  }
}

/**
 * Filters the catalog into per-slot pools, walks their combinations under the
 * configured caps and returns the best `topN` valid builds.
 *
 * The run stops early when `maxChecks` combinations have been inspected or
 * once enough valid builds (`max(maxBuilds, topN)`) are collected; either way
 * `truncated` is set. Throws {@link BuildConfigError} on an invalid config.
 */
export function generateBuilds(
  catalog: CatalogSnapshot,
  input: BuildConfigInput = {},
  options: BuildGenerationOptions = {},
): BuildGenerationResult {
  const config = parseBuildConfig(input);
  const log = options.logger ?? childLogger('generate', rootLogger);
  const classData = (options.classData ?? DEFAULT_CLASS_DATA)[config.characterClass];
  const { onProgress } = options;

  const diagnostics: string[] = [];
  const rejected = emptyRejections();
  const result = (
    stopReason: StopReason,
    fields: Partial<Omit<BuildGenerationResult, 'stopReason' | 'diagnostics' | 'rejected'>> = {},
  ): BuildGenerationResult => ({
    builds: [],
    truncated: false,
    checkedCombinations: 0,
    validBuilds: 0,
    scoringFallbacks: 0,
    poolSizes: { helmet: 0, chestplate: 0, leggings: 0, boots: 0, ring: 0, bracelet: 0, necklace: 0, weapon: 0 },
    ...fields,
    stopReason,
    rejected,
    diagnostics,
  });

  if (config.topN === 0) {
    diagnostics.push('topN is 0; nothing to generate.');
    onProgress?.({ phase: 'diagnostics', checkedCombinations: 0, validBuilds: 0, maxChecks: config.maxChecks, reasonCode: 'empty_target', detail: diagnostics[0] });
    return result('empty_target');
  }

  reportUnresolvedNames(catalog, config, log, diagnostics);

  const pools = buildSlotPools(catalog, config);
  const sizes = poolSizes(pools);
  log.debug(`Candidate pools for ${config.characterClass}/${config.playstyle}: ${ITEM_CATEGORY_KEYS.map((key) => `${key}=${sizes[key]}`).join(' ')}`);
  onProgress?.({
    phase: 'filtering',
    checkedCombinations: 0,
    validBuilds: 0,
    maxChecks: config.maxChecks,
    detail: `${countCombinations(pools)} combinations before caps.`,
  });

  for (const category of pinnedCategories(catalog, config.itemFilters)) {
    if (pools[category].length > 0) continue;
    const message = `included items for slot ${category} were all filtered out`;
    diagnostics.push(message);
    log.warn(message);
  }

  const emptySlots = MANDATORY_CATEGORIES.filter((category) => pools[category].length === 0);
  if (emptySlots.length > 0) {
    for (const slot of emptySlots) diagnostics.push(`no candidates for slot ${slot}`);
    onProgress?.({
      phase: 'diagnostics',
      checkedCombinations: 0,
      validBuilds: 0,
      maxChecks: config.maxChecks,
      reasonCode: 'empty_pool',
      detail: diagnostics.join('; '),
    });
    log.debug(`No builds generated: ${emptySlots.join(', ')} had no candidates.`);
    return result('empty_pool', { poolSizes: sizes });
  }

  const constraints = {
    characterClass: config.characterClass,
    maxSkillPoints: config.maxSkillPoints,
    minDps: config.minDps,
    minManaRegen: config.minManaRegen,
    maxCost: config.maxCost,
  };
  const deriveContext = { classData, characterLevel: config.characterLevel, maxSkillPoints: config.maxSkillPoints };
  const target = Math.max(config.maxBuilds, config.topN);
  const selector = new TopNSelector<Candidate>(config.topN);

  let checkedCombinations = 0;
  let validBuilds = 0;
  let scoringFallbacks = 0;
  let stopReason: StopReason = 'exhausted';

  for (const build of enumerateBuilds(pools)) {
    if (validBuilds >= target) {
      stopReason = 'target_reached';
      break;
    }
    if (checkedCombinations >= config.maxChecks) {
      stopReason = 'check_limit';
      break;
    }
    checkedCombinations++;
    if (checkedCombinations % PROGRESS_INTERVAL === 0) {
      onProgress?.({ phase: 'enumerating', checkedCombinations, validBuilds, maxChecks: config.maxChecks });
    }

    const structural = checkBuildStructure(build, constraints);
    if (structural) {
      rejected[structural.code]++;
      continue;
    }
    const aggregated = aggregateBuild(build);
    const derived = deriveBuildStats(build, aggregated, deriveContext);
    const threshold = checkBuildThresholds(derived, constraints);
    if (threshold) {
      rejected[threshold.code]++;
      continue;
    }

    validBuilds++;
    const outcome = scoreCandidate({ build, aggregated, derived, weights: config.weights }, config.customScoringFn);
    if (outcome.fallback) {
      scoringFallbacks++;
      if (scoringFallbacks === 1) log.warn(`Falling back to the default score: ${outcome.reason}`);
    }
    selector.offer({ build, aggregated, derived }, outcome.score);
  }

  if (scoringFallbacks > 1) {
    log.warn(`Default score used for ${scoringFallbacks} builds after custom scoring failed.`);
  }
  if (scoringFallbacks > 0) {
    diagnostics.push(`custom scoring failed for ${scoringFallbacks} builds; default score used`);
  }

  const builds: ScoredBuild[] = selector.results().map(({ value, score }) => ({
    ...value,
    score,
    warnings: collectBuildWarnings(value.build).map((warning) => warning.message),
  }));
  const truncated = stopReason !== 'exhausted';
  const summary = `Checked ${checkedCombinations} combinations, ${validBuilds} valid, kept ${builds.length} (${stopReason}).`;
  diagnostics.push(summary);
  log.debug(summary);

  const finalEvent: BuildProgressEvent = {
    phase: 'diagnostics',
    checkedCombinations,
    validBuilds,
    maxChecks: config.maxChecks,
    reasonCode: stopReason,
    detail: summary,
  };
  onProgress?.(finalEvent);

  return result(stopReason, {
    builds,
    truncated,
    checkedCombinations,
    validBuilds,
    scoringFallbacks,
    poolSizes: sizes,
  });
}
