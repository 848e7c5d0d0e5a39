import { describe, expect, it } from 'vitest';
import { DEFAULT_CLASS_DATA } from '@/domain/class-data/class-data';
import { aggregateBuild } from '@/domain/build/aggregate';
import {
  attackSpeedMultiplier,
  computeBuildCost,
  computeDamageBreakdown,
  computeEffectiveHp,
  computeManaSustain,
  computeSpellCosts,
  computeSpellDps,
  deriveBuildStats,
  effectiveHealth,
  spellCost,
  weaponAverageDamage,
} from '@/domain/build/build-metrics';
import { makeBuild, makeItem } from '@/tests/helpers';

const mage = DEFAULT_CLASS_DATA.Mage;

describe('aggregateBuild', () => {
  it('sums identifications, base stats and requirements across slots', () => {
    const stats = aggregateBuild(
      makeBuild({
        helmet: makeItem({ name: 'Bright Cap', type: 'helmet', hp: 500, mr: 3, intReq: 20, int: 5 }),
        ring1: makeItem({ name: 'Left Loop', type: 'ring', mr: 2, ms: 4, intReq: 10 }),
        ring2: makeItem({ name: 'Right Loop', type: 'ring', sdPct: 7, mana: 3 }),
      }),
    );
    expect(stats.itemCount).toBe(3);
    expect(stats.hp).toBe(500);
    expect(stats.mana).toBe(3);
    expect(stats.mr).toBe(5);
    expect(stats.ms).toBe(4);
    expect(stats.sdPct).toBe(7);
    expect(stats.int).toBe(5);
    expect(stats.requirements).toEqual({ str: 0, dex: 0, int: 30, def: 0, agi: 0 });
    expect(stats.hpBonus).toBe(0);
  });

  it('returns zeros for an empty build', () => {
    const stats = aggregateBuild(makeBuild({}));
    expect(stats.itemCount).toBe(0);
    expect(stats.sdRaw).toBe(0);
    expect(stats.requirements).toEqual({ str: 0, dex: 0, int: 0, def: 0, agi: 0 });
  });
});

describe('damage', () => {
  const wand = makeItem({ name: 'Test Wand', type: 'wand', nDam: '100-200', atkSpd: 'NORMAL' });

  it('averages every damage range on the weapon', () => {
    const staff = makeItem({ name: 'Twin Wand', type: 'wand', nDam: '100-200', fDam: '50-150' });
    expect(weaponAverageDamage(staff)).toBe(250);
    expect(weaponAverageDamage(null)).toBe(0);
  });

  it('estimates damage from level when a weapon lists no ranges', () => {
    expect(weaponAverageDamage(makeItem({ name: 'Blank Wand', type: 'wand', lvl: 100 }))).toBeCloseTo(120, 10);
    expect(weaponAverageDamage(makeItem({ name: 'Blank Spear', type: 'spear', lvl: 50 }))).toBeCloseTo(70, 10);
  });

  it('applies spell bonuses, conversions and attack speed', () => {
    const helmet = makeItem({ name: 'Focus Hood', type: 'helmet', sdPct: 20, fDamPct: 10, sdRaw: 50, fDamRaw: 10 });
    const stats = aggregateBuild(makeBuild({ weapon: wand, helmet }));
    // (150 * 1.0 * 0.44) * 1.3 + 60, at NORMAL speed
    expect(computeSpellDps(wand, stats, mage)).toBeCloseTo(298.89, 6);
  });

  it('scales attack speed with attack tier', () => {
    expect(attackSpeedMultiplier('FAST', 1)).toBeCloseTo(2.875, 10);
    expect(attackSpeedMultiplier('SUPER_SLOW', 0)).toBe(0.51);
    expect(attackSpeedMultiplier(undefined, 0)).toBe(2.05);
  });

  it('is exactly zero without a weapon', () => {
    const helmet = makeItem({ name: 'Raw Hood', type: 'helmet', sdRaw: 400, poison: 90 });
    const build = makeBuild({ helmet });
    const stats = aggregateBuild(build);
    expect(computeSpellDps(null, stats, mage)).toBe(0);
    expect(deriveBuildStats(build, stats, { classData: mage, characterLevel: 106, maxSkillPoints: 200 }).dps).toBe(0);
  });

  it('never goes negative', () => {
    const helmet = makeItem({ name: 'Cursed Hood', type: 'helmet', sdRaw: -5000 });
    const stats = aggregateBuild(makeBuild({ weapon: wand, helmet }));
    expect(computeSpellDps(wand, stats, mage)).toBe(0);
  });

  it('breaks damage into spell, melee and poison', () => {
    const helmet = makeItem({ name: 'Brawler Hood', type: 'helmet', mdPct: 50, poison: 300 });
    const stats = aggregateBuild(makeBuild({ weapon: wand, helmet }));
    const damage = computeDamageBreakdown(wand, stats, mage);
    expect(damage.spell).toBeCloseTo(135.3, 6);
    expect(damage.melee).toBeCloseTo(230.625, 6);
    expect(damage.poison).toBe(100);
    expect(damage.total).toBeCloseTo(465.925, 6);
  });

  it('skips melee without melee damage bonuses', () => {
    const stats = aggregateBuild(makeBuild({ weapon: wand }));
    expect(computeDamageBreakdown(wand, stats, mage).melee).toBe(0);
  });
});

describe('effective health', () => {
  it('caps defense reduction at 80%', () => {
    const ehp = effectiveHealth({ totalHp: 1000, defense: 300, agility: 0, defenseMultiplier: 1 });
    expect(ehp.defenseReduction).toBe(0.8);
    expect(ehp.dodgeChance).toBe(0);
    expect(ehp.combinedEhp).toBeCloseTo(5000, 6);
    expect(ehp.defenseEhp).toBeCloseTo(5000, 6);
    expect(ehp.agilityEhp).toBe(1000);
  });

  it('caps dodge at 75% and applies the class multiplier to defense only', () => {
    const ehp = effectiveHealth({ totalHp: 1000, defense: 0, agility: 500, defenseMultiplier: 0.5 });
    expect(ehp.dodgeChance).toBe(0.75);
    expect(ehp.agilityEhp).toBe(4000);
    expect(ehp.defenseEhp).toBe(2000);
    expect(ehp.combinedEhp).toBe(8000);
  });

  it('floors the damage taken factor', () => {
    const ehp = effectiveHealth({ totalHp: 1000, defense: 300, agility: 500, defenseMultiplier: 0.01 });
    expect(ehp.combinedEhp).toBeCloseTo(100000, 4);
  });

  it('adds per-level health to item health', () => {
    const build = makeBuild({
      helmet: makeItem({ name: 'Stout Helm', type: 'helmet', hp: 500, hpBonus: 200 }),
      chestplate: makeItem({ name: 'Stout Plate', type: 'chestplate', hp: 800 }),
    });
    const ehp = computeEffectiveHp(aggregateBuild(build), 100, mage);
    expect(ehp.totalHp).toBe(2000);
    expect(ehp.combinedEhp).toBeCloseTo(2500, 6);
  });
});

describe('mana and spell costs', () => {
  it('combines regen and steal', () => {
    const stats = aggregateBuild(makeBuild({ ring1: makeItem({ name: 'Well Ring', type: 'ring', mr: 5, ms: 10 }) }));
    expect(computeManaSustain(stats)).toBeCloseTo(5.2, 10);
    const drain = aggregateBuild(makeBuild({ ring1: makeItem({ name: 'Drain Ring', type: 'ring', mr: -3 }) }));
    expect(computeManaSustain(drain)).toBe(0);
  });

  it('reduces cost with intelligence but never below 1', () => {
    expect(spellCost(8, 20)).toBe(1);
    expect(spellCost(6, 0)).toBe(6);
    expect(spellCost(6, 4, 2)).toBe(6);
    expect(spellCost(8, 0, 0, 50)).toBe(4);
    expect(spellCost(4, -10)).toBe(4);
    expect(spellCost(6, 100, 0, 90)).toBe(1);
  });

  it('costs every class spell from build modifiers', () => {
    const stats = aggregateBuild(
      makeBuild({ helmet: makeItem({ name: 'Scholar Cap', type: 'helmet', int: 4, spRaw1: 2, spPct2: -50 }) }),
    );
    expect(computeSpellCosts(stats, mage)).toEqual([6, 3, 2, 2]);
  });
});

describe('build cost and skill points', () => {
  it('weights tier cost by item level', () => {
    const build = makeBuild({
      helmet: makeItem({ name: 'Gilded Helm', type: 'helmet', tier: 'Legendary', lvl: 100 }),
      boots: makeItem({ name: 'Plain Boots', type: 'boots', tier: 'Unique', lvl: 20 }),
      necklace: makeItem({ name: 'Star Pendant', type: 'necklace', tier: 'Mythic', lvl: 106 }),
      ring1: makeItem({ name: 'Tin Ring', type: 'ring', tier: 'Normal' }),
    });
    expect(computeBuildCost(build)).toBeCloseTo(1161, 6);
  });

  it('derives requirement totals and unused points', () => {
    const weapon = makeItem({ name: 'Study Wand', type: 'wand', nDam: '10-20', intReq: 30 });
    const helmet = makeItem({ name: 'Study Cap', type: 'helmet', intReq: 20, agiReq: 15 });
    const build = makeBuild({ weapon, helmet });
    const derived = deriveBuildStats(build, aggregateBuild(build), { classData: mage, characterLevel: 106, maxSkillPoints: 200 });
    expect(derived.skillPoints).toEqual({ str: 0, dex: 0, int: 50, def: 0, agi: 15 });
    expect(derived.skillPointTotal).toBe(65);
    expect(derived.unusedSkillPoints).toBe(135);
  });

  it('is a pure function of its inputs', () => {
    const weapon = makeItem({ name: 'Echo Wand', type: 'wand', nDam: '40-80', sdPct: 15 });
    const build = makeBuild({ weapon });
    const context = { classData: mage, characterLevel: 106, maxSkillPoints: 200 };
    expect(deriveBuildStats(build, aggregateBuild(build), context)).toEqual(deriveBuildStats(build, aggregateBuild(build), context));
  });
});
