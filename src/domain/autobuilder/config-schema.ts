import { z } from 'zod';
import { BuildConfigError, formatZodIssues } from '@/lib/errors';
import { ELEMENTS, MAX_LEVEL, isItemTier, parseCharacterClass } from '@/domain/items/types';
import type { Element } from '@/domain/items/types';
import { MIN_ITEM_LEVEL } from '@/domain/items/normalize';
import type { BuildConfig, CustomScoringFn, ItemFilters, Playstyle, PresetPatch, ScoringWeights } from '@/domain/autobuilder/types';
import {
  BUILD_PRESETS,
  BUILD_PRESET_PATCHES,
  DEFAULT_BUILD_CONFIG,
  ELEMENT_MODES,
  ITEM_STAT_KEYS,
  PLAYSTYLES,
  PLAYSTYLE_WEIGHTS,
} from '@/domain/autobuilder/types';

function caseInsensitiveEnum<T extends string>(values: readonly T[], label: string) {
  return z.string().transform((value, ctx): T => {
    const lowered = value.trim().toLowerCase();
    const match = values.find((candidate) => candidate.toLowerCase() === lowered);
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown ${label} "${value}"; expected one of ${values.join(', ')}` });
      return z.NEVER;
    }
    return match;
  });
}

const characterClassSchema = z.string().transform((value, ctx) => {
  const characterClass = parseCharacterClass(value);
  if (!characterClass) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown class "${value}"` });
    return z.NEVER;
  }
  return characterClass;
});

const playstyleSchema = caseInsensitiveEnum<Playstyle>(PLAYSTYLES, 'playstyle');
const elementSchema = caseInsensitiveEnum<Element>(ELEMENTS, 'element');

const levelSchema = z.number().int().min(MIN_ITEM_LEVEL).max(MAX_LEVEL);
const countSchema = z.number().int().min(0);

const tierSchema = z.string().transform((value, ctx) => {
  const trimmed = value.trim();
  const titled = trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
  if (!isItemTier(titled)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown tier "${value}"` });
    return z.NEVER;
  }
  return titled;
});

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

const statBoundsSchema = z.record(z.enum(ITEM_STAT_KEYS), z.number().finite());

const itemFiltersSchema = z
  .object({
    includeItems: z.array(z.string()),
    excludeItems: z.array(z.string()),
    namePattern: z.string().refine(isValidPattern, 'namePattern is not a valid regular expression').nullable(),
    minStats: statBoundsSchema,
    maxStats: statBoundsSchema,
    allowedTiers: z.array(tierSchema),
  })
  .partial()
  .strict();

const weightsSchema = z
  .object({
    dps: z.number().finite(),
    ehp: z.number().finite(),
    mana: z.number().finite(),
    bonus: z.number().finite(),
  })
  .partial()
  .strict();

export const buildConfigSchema = z
  .object({
    characterClass: characterClassSchema,
    playstyle: playstyleSchema,
    elements: z.array(elementSchema),
    elementMode: z.enum(ELEMENT_MODES),
    maxSkillPoints: countSchema,
    noMythics: z.boolean(),
    levelRange: z
      .tuple([levelSchema, levelSchema])
      .refine(([min, max]) => min <= max, 'levelRange minimum must not exceed its maximum'),
    characterLevel: levelSchema,
    minDps: z.number().finite().min(0),
    minManaRegen: z.number().finite(),
    maxCost: z.number().finite().min(0).nullable(),
    topN: countSchema,
    maxBuilds: countSchema,
    maxChecks: countSchema,
    maxItemsPerSlot: z.number().int().min(1),
    weights: weightsSchema,
    itemFilters: itemFiltersSchema,
    preset: z.enum(BUILD_PRESETS).nullable(),
    customScoringFn: z
      .custom<CustomScoringFn>((value) => typeof value === 'function', 'customScoringFn must be a function')
      .nullable(),
  })
  .partial()
  .strict();

export type BuildConfigInput = z.input<typeof buildConfigSchema>;

/** Later layers win; stat bounds merge per key. Every array is copied. */
function mergeItemFilters(...layers: Array<Partial<ItemFilters> | undefined>): ItemFilters {
  const base = DEFAULT_BUILD_CONFIG.itemFilters;
  const merged: ItemFilters = {
    includeItems: [...base.includeItems],
    excludeItems: [...base.excludeItems],
    namePattern: base.namePattern,
    minStats: { ...base.minStats },
    maxStats: { ...base.maxStats },
    allowedTiers: [...base.allowedTiers],
  };
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.includeItems) merged.includeItems = [...layer.includeItems];
    if (layer.excludeItems) merged.excludeItems = [...layer.excludeItems];
    if (typeof layer.namePattern !== 'undefined') merged.namePattern = layer.namePattern;
    if (layer.minStats) merged.minStats = { ...merged.minStats, ...layer.minStats };
    if (layer.maxStats) merged.maxStats = { ...merged.maxStats, ...layer.maxStats };
    if (layer.allowedTiers) merged.allowedTiers = [...layer.allowedTiers];
  }
  return merged;
}

function mergeWeights(profile: ScoringWeights, ...layers: Array<Partial<ScoringWeights> | undefined>): ScoringWeights {
  const merged: ScoringWeights = { ...profile };
  for (const layer of layers) {
    if (!layer) continue;
    if (typeof layer.dps === 'number') merged.dps = layer.dps;
    if (typeof layer.ehp === 'number') merged.ehp = layer.ehp;
    if (typeof layer.mana === 'number') merged.mana = layer.mana;
    if (typeof layer.bonus === 'number') merged.bonus = layer.bonus;
  }
  return merged;
}

/**
 * Validates caller input and fills every omitted field. A preset supplies
 * values only where the caller left a field out. Throws
 * {@link BuildConfigError} listing every bad field.
 */
export function parseBuildConfig(input: unknown = {}): BuildConfig {
  const parsed = buildConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new BuildConfigError(formatZodIssues(parsed.error));
  }
  const explicit = parsed.data;
  const preset = explicit.preset ?? null;
  const patch: PresetPatch = preset ? BUILD_PRESET_PATCHES[preset] : {};
  const defaults = DEFAULT_BUILD_CONFIG;

  const playstyle = explicit.playstyle ?? patch.playstyle ?? defaults.playstyle;
  const elements = [...new Set(explicit.elements ?? defaults.elements)];
  const [minLevel, maxLevel] = explicit.levelRange ?? patch.levelRange ?? defaults.levelRange;

  return {
    characterClass: explicit.characterClass ?? defaults.characterClass,
    playstyle,
    elements,
    elementMode: explicit.elementMode ?? defaults.elementMode,
    maxSkillPoints: explicit.maxSkillPoints ?? defaults.maxSkillPoints,
    noMythics: explicit.noMythics ?? patch.noMythics ?? defaults.noMythics,
    levelRange: [minLevel, maxLevel],
    characterLevel: explicit.characterLevel ?? defaults.characterLevel,
    minDps: explicit.minDps ?? defaults.minDps,
    minManaRegen: explicit.minManaRegen ?? defaults.minManaRegen,
    maxCost: typeof explicit.maxCost === 'undefined' ? defaults.maxCost : explicit.maxCost,
    topN: explicit.topN ?? defaults.topN,
    maxBuilds: explicit.maxBuilds ?? defaults.maxBuilds,
    maxChecks: explicit.maxChecks ?? defaults.maxChecks,
    maxItemsPerSlot: explicit.maxItemsPerSlot ?? defaults.maxItemsPerSlot,
    weights: mergeWeights(PLAYSTYLE_WEIGHTS[playstyle], explicit.weights),
    itemFilters: mergeItemFilters(patch.itemFilters, explicit.itemFilters),
    preset,
    customScoringFn: explicit.customScoringFn ?? null,
  };
}
