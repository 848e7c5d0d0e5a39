import { z } from 'zod';
import { ClassDataError, formatZodIssues } from '@/lib/errors';
import type { CharacterClass } from '@/domain/items/types';
import { CHARACTER_CLASSES, ELEMENTS, parseCharacterClass } from '@/domain/items/types';
import type { ClassData, ClassDataTable, SpellConversionTable, SpellCosts } from '@/domain/class-data/types';

export const DEFAULT_CLASS_DATA: ClassDataTable = freezeTable({
  Mage: {
    baseSpellMultiplier: 1.0,
    spellConversions: {
      meteor: { earth: 30, fire: 30 },
      ice_snake: { water: 70 },
      teleport: { air: 50 },
      heal: { water: 40 },
    },
    defenseMultiplier: 0.8,
    healthPerLevel: 5,
    manaPerLevel: 20,
    spellBaseCosts: [6, 8, 4, 4],
  },
  Archer: {
    baseSpellMultiplier: 1.0,
    spellConversions: {
      arrow_storm: { air: 40 },
      escape: { air: 80 },
      bomb: { fire: 100 },
      arrow_shield: { earth: 30 },
    },
    defenseMultiplier: 0.6,
    healthPerLevel: 5,
    manaPerLevel: 15,
    spellBaseCosts: [6, 8, 4, 6],
  },
  Warrior: {
    baseSpellMultiplier: 0.9,
    spellConversions: {
      bash: { earth: 50 },
      charge: { earth: 30 },
      uppercut: { thunder: 50 },
      war_scream: { thunder: 30 },
    },
    defenseMultiplier: 1.2,
    healthPerLevel: 5,
    manaPerLevel: 10,
    spellBaseCosts: [4, 6, 4, 8],
  },
  Assassin: {
    baseSpellMultiplier: 1.1,
    spellConversions: {
      spin_attack: { air: 40 },
      vanish: { air: 20 },
      multihit: { thunder: 30 },
      smoke_bomb: { fire: 20 },
    },
    defenseMultiplier: 1.0,
    healthPerLevel: 5,
    manaPerLevel: 10,
    spellBaseCosts: [4, 6, 4, 8],
  },
  Shaman: {
    baseSpellMultiplier: 1.0,
    spellConversions: {
      totem: { earth: 40 },
      haul: { air: 60 },
      aura: { water: 30 },
      uproot: { earth: 60 },
    },
    defenseMultiplier: 0.5,
    healthPerLevel: 5,
    manaPerLevel: 15,
    spellBaseCosts: [6, 4, 6, 8],
  },
});

const spellCostSchema = z.number().int().min(1);

const classDataOverrideSchema = z
  .object({
    baseSpellMultiplier: z.number().finite().positive(),
    spellConversions: z.record(z.string(), z.record(z.enum(ELEMENTS), z.number().min(0).max(100))),
    defenseMultiplier: z.number().finite().positive(),
    healthPerLevel: z.number().finite().min(0),
    manaPerLevel: z.number().finite().min(0),
    spellBaseCosts: z.tuple([spellCostSchema, spellCostSchema, spellCostSchema, spellCostSchema]),
  })
  .partial()
  .strict();

type ClassDataOverride = z.infer<typeof classDataOverrideSchema>;

const classOverridesSchema = z.record(z.string(), z.unknown()).transform((raw, ctx) => {
  const overrides: Partial<Record<CharacterClass, ClassDataOverride>> = {};
  for (const [key, value] of Object.entries(raw)) {
    const characterClass = parseCharacterClass(key);
    if (!characterClass) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `Unknown class "${key}"` });
      continue;
    }
    const parsed = classDataOverrideSchema.safeParse(value);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [characterClass, ...issue.path], message: issue.message });
      }
      continue;
    }
    overrides[characterClass] = parsed.data;
  }
  return overrides;
});

function freezeEntry(entry: ClassData): ClassData {
  if (Object.isFrozen(entry)) return entry;
  const conversions: Record<string, Readonly<ClassData['spellConversions'][string]>> = {};
  for (const [spell, split] of Object.entries(entry.spellConversions)) {
    conversions[spell] = Object.freeze({ ...split });
  }
  const [first, second, third, fourth] = entry.spellBaseCosts;
  const costs: SpellCosts = [first, second, third, fourth];
  return Object.freeze({
    ...entry,
    spellConversions: Object.freeze(conversions),
    spellBaseCosts: Object.freeze(costs),
  });
}

function freezeTable(table: Record<CharacterClass, ClassData>): ClassDataTable {
  return Object.freeze({
    Warrior: freezeEntry(table.Warrior),
    Assassin: freezeEntry(table.Assassin),
    Mage: freezeEntry(table.Mage),
    Archer: freezeEntry(table.Archer),
    Shaman: freezeEntry(table.Shaman),
  });
}

function mergeEntry(base: ClassData, override: ClassDataOverride | undefined): ClassData {
  if (!override) return base;
  return {
    baseSpellMultiplier: override.baseSpellMultiplier ?? base.baseSpellMultiplier,
    spellConversions: override.spellConversions
      ? { ...base.spellConversions, ...override.spellConversions }
      : base.spellConversions,
    defenseMultiplier: override.defenseMultiplier ?? base.defenseMultiplier,
    healthPerLevel: override.healthPerLevel ?? base.healthPerLevel,
    manaPerLevel: override.manaPerLevel ?? base.manaPerLevel,
    spellBaseCosts: override.spellBaseCosts ?? base.spellBaseCosts,
  };
}

/**
 * Returns the class table, optionally with overrides merged over the defaults.
 * Overrides are untrusted input: unknown classes, unknown fields and
 * out-of-range numbers raise {@link ClassDataError}. Spell conversion tables
 * merge per spell; every other field replaces the default.
 */
export function createClassDataTable(overrides?: unknown): ClassDataTable {
  if (typeof overrides === 'undefined') return DEFAULT_CLASS_DATA;
  const parsed = classOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ClassDataError(formatZodIssues(parsed.error));
  }
  const merged: Record<CharacterClass, ClassData> = {
    Warrior: DEFAULT_CLASS_DATA.Warrior,
    Assassin: DEFAULT_CLASS_DATA.Assassin,
    Mage: DEFAULT_CLASS_DATA.Mage,
    Archer: DEFAULT_CLASS_DATA.Archer,
    Shaman: DEFAULT_CLASS_DATA.Shaman,
  };
  for (const characterClass of CHARACTER_CLASSES) {
    merged[characterClass] = mergeEntry(DEFAULT_CLASS_DATA[characterClass], parsed.data[characterClass]);
  }
  return freezeTable(merged);
}

/** Mean of every conversion percentage in the table, as a fraction. No conversions means 1. */
export function spellConversionFactor(conversions: SpellConversionTable): number {
  let total = 0;
  let count = 0;
  for (const split of Object.values(conversions)) {
    for (const element of ELEMENTS) {
      const pct = split[element];
      if (typeof pct !== 'number') continue;
      total += pct;
      count += 1;
    }
  }
  return count === 0 ? 1 : total / count / 100;
}
