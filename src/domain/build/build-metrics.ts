import type { AttackSpeed, IdentificationKey, ItemTier, NormalizedItem, WeaponType } from '@/domain/items/types';
import {
  ELEMENT_DAMAGE_PCT_KEYS,
  ELEMENT_DAMAGE_RAW_KEYS,
  ITEM_SLOTS,
  SKILL_STATS,
  emptySkillVector,
  skillVectorTotal,
} from '@/domain/items/types';
import type { ClassData, SpellCosts } from '@/domain/class-data/types';
import { spellConversionFactor } from '@/domain/class-data/class-data';
import type { AggregatedStats, Build, DamageBreakdown, DerivedStats, EffectiveHealth } from '@/domain/build/types';

export const ATTACK_SPEED_MULTIPLIERS: Record<AttackSpeed, number> = {
  SUPER_SLOW: 0.51,
  VERY_SLOW: 0.83,
  SLOW: 1.5,
  NORMAL: 2.05,
  FAST: 2.5,
  VERY_FAST: 3.1,
  SUPER_FAST: 4.3,
};

const ATTACK_TIER_STEP = 0.15;

// Per-level damage estimate for weapons listed without damage ranges.
const WEAPON_LEVEL_DAMAGE: Record<WeaponType, number> = {
  wand: 1.2,
  spear: 1.4,
  bow: 1.1,
  dagger: 1.0,
  relik: 1.3,
};

export const TIER_COST: Record<ItemTier, number> = {
  Normal: 0,
  Unique: 1,
  Rare: 5,
  Set: 20,
  Legendary: 50,
  Mythic: 500,
  Fabled: 1000,
};

const MAX_DEFENSE_REDUCTION = 0.8;
const DEFENSE_REDUCTION_PER_POINT = 0.003;
const MAX_DODGE_CHANCE = 0.75;
const DODGE_PER_POINT = 0.002;
const MIN_DAMAGE_TAKEN = 0.01;
const MANA_STEAL_FACTOR = 2.0;
const MELEE_SHARE = 0.5;
const POISON_TICKS = 3;

const SPELL_RAW_KEYS = ['spRaw1', 'spRaw2', 'spRaw3', 'spRaw4'] as const;
const SPELL_PCT_KEYS = ['spPct1', 'spPct2', 'spPct3', 'spPct4'] as const;

export interface DeriveContext {
  classData: ClassData;
  characterLevel: number;
  maxSkillPoints: number;
}

export function weaponAverageDamage(weapon: NormalizedItem | null): number {
  if (!weapon?.weapon) return 0;
  const ranges = Object.values(weapon.weapon.damages);
  if (ranges.length === 0) {
    return weapon.level * WEAPON_LEVEL_DAMAGE[weapon.weapon.type];
  }
  let total = 0;
  for (const range of ranges) {
    total += (range.min + range.max) / 2;
  }
  return total;
}

export function attackSpeedMultiplier(attackSpeed: AttackSpeed | undefined, atkTier: number): number {
  const base = ATTACK_SPEED_MULTIPLIERS[attackSpeed ?? 'NORMAL'];
  return base * (1 + atkTier * ATTACK_TIER_STEP);
}

function sumKeys(stats: AggregatedStats, keys: readonly IdentificationKey[]): number {
  let total = 0;
  for (const key of keys) total += stats[key];
  return total;
}

/** Spell damage per second for the build's weapon. No weapon means exactly 0. */
export function computeSpellDps(weapon: NormalizedItem | null, stats: AggregatedStats, classData: ClassData): number {
  if (!weapon?.weapon) return 0;
  const base = weaponAverageDamage(weapon) * classData.baseSpellMultiplier * spellConversionFactor(classData.spellConversions);
  const pct = 1 + stats.sdPct / 100 + sumKeys(stats, ELEMENT_DAMAGE_PCT_KEYS) / 100;
  const perHit = base * pct + stats.sdRaw + sumKeys(stats, ELEMENT_DAMAGE_RAW_KEYS);
  return Math.max(0, perHit * attackSpeedMultiplier(weapon.weapon.attackSpeed, stats.atkTier));
}

export function computeDamageBreakdown(weapon: NormalizedItem | null, stats: AggregatedStats, classData: ClassData): DamageBreakdown {
  const spell = computeSpellDps(weapon, stats, classData);
  let melee = 0;
  if (weapon?.weapon && stats.mdPct > 0) {
    const speed = attackSpeedMultiplier(weapon.weapon.attackSpeed, stats.atkTier);
    melee = Math.max(0, weaponAverageDamage(weapon) * (1 + stats.mdPct / 100) * speed * MELEE_SHARE);
  }
  const poison = Math.max(0, stats.poison / POISON_TICKS);
  return { spell, melee, poison, total: spell + melee + poison };
}

export function effectiveHealth(params: {
  totalHp: number;
  defense: number;
  agility: number;
  defenseMultiplier: number;
}): EffectiveHealth {
  const { totalHp, defenseMultiplier } = params;
  const defenseReduction = Math.min(MAX_DEFENSE_REDUCTION, Math.max(0, params.defense) * DEFENSE_REDUCTION_PER_POINT);
  const dodgeChance = Math.min(MAX_DODGE_CHANCE, Math.max(0, params.agility) * DODGE_PER_POINT);
  return {
    totalHp,
    defenseEhp: totalHp / Math.max(MIN_DAMAGE_TAKEN, (1 - defenseReduction) * defenseMultiplier),
    agilityEhp: totalHp / Math.max(MIN_DAMAGE_TAKEN, 1 - dodgeChance),
    combinedEhp: totalHp / Math.max(MIN_DAMAGE_TAKEN, (1 - defenseReduction) * (1 - dodgeChance) * defenseMultiplier),
    defenseReduction,
    dodgeChance,
  };
}

export function computeEffectiveHp(stats: AggregatedStats, characterLevel: number, classData: ClassData): EffectiveHealth {
  return effectiveHealth({
    totalHp: classData.healthPerLevel * characterLevel + stats.hp + stats.hpBonus,
    defense: stats.def,
    agility: stats.agi,
    defenseMultiplier: classData.defenseMultiplier,
  });
}

export function computeManaSustain(stats: AggregatedStats): number {
  return Math.max(0, stats.mr + stats.ms * MANA_STEAL_FACTOR * 0.01);
}

/**
 * Mana cost of one cast. Intelligence shaves off up to `baseCost - 1`; the
 * percent reduction applies after the raw modifier. Never below 1.
 */
export function spellCost(baseCost: number, intelligence: number, rawModifier = 0, reductionPct = 0): number {
  const intReduction = intelligence > 0 ? Math.min(Math.floor(intelligence / 2), baseCost - 1) : 0;
  const cost = Math.floor((baseCost - intReduction + rawModifier) * (1 - reductionPct / 100));
  return Math.max(1, cost);
}

export function computeSpellCosts(stats: AggregatedStats, classData: ClassData): SpellCosts {
  const cost = (index: 0 | 1 | 2 | 3) =>
    spellCost(classData.spellBaseCosts[index], stats.int, stats[SPELL_RAW_KEYS[index]], -stats[SPELL_PCT_KEYS[index]]);
  return [cost(0), cost(1), cost(2), cost(3)];
}

export function itemCost(item: Pick<NormalizedItem, 'tier' | 'level'>): number {
  return TIER_COST[item.tier] * Math.max(1, item.level / 50);
}

export function computeBuildCost(build: Build): number {
  let total = 0;
  for (const slot of ITEM_SLOTS) {
    const item = build[slot];
    if (item) total += itemCost(item);
  }
  return total;
}

export function deriveBuildStats(build: Build, stats: AggregatedStats, context: DeriveContext): DerivedStats {
  const { classData } = context;
  const damage = computeDamageBreakdown(build.weapon, stats, classData);
  const skillPoints = emptySkillVector();
  for (const stat of SKILL_STATS) {
    skillPoints[stat] = stats.requirements[stat];
  }
  const skillPointTotal = skillVectorTotal(skillPoints);
  return {
    dps: damage.spell,
    damage,
    manaSustain: computeManaSustain(stats),
    effectiveHp: computeEffectiveHp(stats, context.characterLevel, classData),
    spellCosts: computeSpellCosts(stats, classData),
    cost: computeBuildCost(build),
    skillPoints,
    skillPointTotal,
    unusedSkillPoints: context.maxSkillPoints - skillPointTotal,
  };
}
