import type {
  AggregatedStats,
  Build,
  DerivedStats,
  RejectionReason,
  ScoredBuild,
} from '@/domain/build/types';
import type { CharacterClass, Element, IdentificationKey, ItemCategoryKey, ItemTier } from '@/domain/items/types';
import { IDENTIFICATION_KEYS, MAX_LEVEL } from '@/domain/items/types';
import type { ClassDataTable } from '@/domain/class-data/types';
import type { Logger } from '@/lib/logger';

export const PLAYSTYLES = ['spellspam', 'melee', 'tank', 'hybrid'] as const;
export type Playstyle = (typeof PLAYSTYLES)[number];

/**
 * `prioritize` ranks matching items first and keeps the rest;
 * `strict` drops items with no affinity to any selected element.
 */
export const ELEMENT_MODES = ['prioritize', 'strict'] as const;
export type ElementMode = (typeof ELEMENT_MODES)[number];

export const BUILD_PRESETS = ['glass-cannon', 'budget', 'endgame', 'balanced'] as const;
export type BuildPreset = (typeof BUILD_PRESETS)[number];

/** Item fields a custom item filter can bound. */
export const ITEM_STAT_KEYS = ['hp', 'mana', 'level', ...IDENTIFICATION_KEYS] as const;
export type ItemStatKey = IdentificationKey | 'hp' | 'mana' | 'level';

export interface ScoringWeights {
  dps: number;
  ehp: number;
  mana: number;
  /** Per unused skill point. */
  bonus: number;
}

export const PLAYSTYLE_WEIGHTS: Record<Playstyle, ScoringWeights> = {
  spellspam: { dps: 0.6, ehp: 0.0001, mana: 100, bonus: 10 },
  melee: { dps: 0.4, ehp: 0.0001, mana: 0, bonus: 10 },
  tank: { dps: 0.1, ehp: 0.0002, mana: 20, bonus: 10 },
  hybrid: { dps: 0.3, ehp: 0.0001, mana: 30, bonus: 10 },
};

export interface ItemFilters {
  /** When an included item belongs to a category, that category keeps only included items. */
  includeItems: string[];
  excludeItems: string[];
  /** Case-insensitive regular expression on the item name. */
  namePattern: string | null;
  minStats: Partial<Record<ItemStatKey, number>>;
  maxStats: Partial<Record<ItemStatKey, number>>;
  /** Empty means every tier. */
  allowedTiers: ItemTier[];
}

export interface ScoringInput {
  build: Build;
  aggregated: AggregatedStats;
  derived: DerivedStats;
  weights: ScoringWeights;
}

export type CustomScoringFn = (input: ScoringInput) => number;

export interface BuildConfig {
  characterClass: CharacterClass;
  playstyle: Playstyle;
  elements: Element[];
  elementMode: ElementMode;
  maxSkillPoints: number;
  noMythics: boolean;
  levelRange: [number, number];
  characterLevel: number;
  minDps: number;
  minManaRegen: number;
  maxCost: number | null;
  topN: number;
  /** Valid builds to collect before stopping; never below `topN`. */
  maxBuilds: number;
  maxChecks: number;
  maxItemsPerSlot: number;
  /** Playstyle profile with caller overrides already applied. */
  weights: ScoringWeights;
  itemFilters: ItemFilters;
  preset: BuildPreset | null;
  customScoringFn: CustomScoringFn | null;
}

export const DEFAULT_ITEM_FILTERS: ItemFilters = {
  includeItems: [],
  excludeItems: [],
  namePattern: null,
  minStats: {},
  maxStats: {},
  allowedTiers: [],
};

export const DEFAULT_BUILD_CONFIG: BuildConfig = {
  characterClass: 'Mage',
  playstyle: 'spellspam',
  elements: [],
  elementMode: 'prioritize',
  maxSkillPoints: 200,
  noMythics: false,
  levelRange: [80, MAX_LEVEL],
  characterLevel: MAX_LEVEL,
  minDps: 0,
  minManaRegen: 0,
  maxCost: null,
  topN: 10,
  maxBuilds: 1000,
  maxChecks: 50000,
  maxItemsPerSlot: 20,
  weights: PLAYSTYLE_WEIGHTS.spellspam,
  itemFilters: DEFAULT_ITEM_FILTERS,
  preset: null,
  customScoringFn: null,
};

export interface PresetPatch {
  playstyle?: Playstyle;
  noMythics?: boolean;
  levelRange?: [number, number];
  itemFilters?: Partial<ItemFilters>;
}

export const BUILD_PRESET_PATCHES: Record<BuildPreset, PresetPatch> = {
  'glass-cannon': { playstyle: 'spellspam', itemFilters: { minStats: { sdPct: 50 } } },
  budget: { noMythics: true, levelRange: [1, 80], itemFilters: { allowedTiers: ['Normal', 'Unique', 'Rare', 'Fabled', 'Set'] } },
  endgame: { levelRange: [95, MAX_LEVEL], itemFilters: { allowedTiers: ['Legendary', 'Mythic'] } },
  balanced: { playstyle: 'hybrid', itemFilters: { minStats: { hp: 1000, mr: 3 } } },
};

export type StopReason = 'empty_pool' | 'empty_target' | 'check_limit' | 'target_reached' | 'exhausted';

export interface BuildGenerationResult {
  builds: ScoredBuild[];
  truncated: boolean;
  stopReason: StopReason;
  checkedCombinations: number;
  validBuilds: number;
  rejected: Record<RejectionReason, number>;
  scoringFallbacks: number;
  poolSizes: Record<ItemCategoryKey, number>;
  diagnostics: string[];
}

export interface BuildProgressEvent {
  phase: 'filtering' | 'enumerating' | 'diagnostics';
  checkedCombinations: number;
  validBuilds: number;
  maxChecks: number;
  detail?: string;
  reasonCode?: StopReason;
}

export interface BuildGenerationOptions {
  classData?: ClassDataTable;
  logger?: Logger;
  onProgress?: (event: BuildProgressEvent) => void;
}
