import { describe, expect, it } from 'vitest';
import { DEFAULT_CLASS_DATA, createClassDataTable, spellConversionFactor } from '@/domain/class-data/class-data';
import { ClassDataError } from '@/lib/errors';

describe('class data', () => {
  it('ships a frozen default table', () => {
    expect(Object.isFrozen(DEFAULT_CLASS_DATA)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CLASS_DATA.Mage)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CLASS_DATA.Mage.spellConversions.meteor)).toBe(true);
    expect(DEFAULT_CLASS_DATA.Warrior.baseSpellMultiplier).toBe(0.9);
    expect(DEFAULT_CLASS_DATA.Shaman.spellBaseCosts).toEqual([6, 4, 6, 8]);
  });

  it('averages conversion percentages per class', () => {
    expect(spellConversionFactor(DEFAULT_CLASS_DATA.Mage.spellConversions)).toBeCloseTo(0.44, 10);
    expect(spellConversionFactor(DEFAULT_CLASS_DATA.Archer.spellConversions)).toBeCloseTo(0.625, 10);
    expect(spellConversionFactor(DEFAULT_CLASS_DATA.Assassin.spellConversions)).toBeCloseTo(0.275, 10);
    expect(spellConversionFactor({})).toBe(1);
  });

  it('returns the defaults when no overrides are given', () => {
    expect(createClassDataTable()).toBe(DEFAULT_CLASS_DATA);
  });

  it('merges overrides over the defaults without touching them', () => {
    const table = createClassDataTable({
      mage: { defenseMultiplier: 0.5, spellConversions: { meteor: { fire: 100 } } },
    });
    expect(table.Mage.defenseMultiplier).toBe(0.5);
    expect(table.Mage.spellConversions.meteor).toEqual({ fire: 100 });
    expect(table.Mage.spellConversions.ice_snake).toEqual({ water: 70 });
    expect(table.Mage.manaPerLevel).toBe(20);
    expect(table.Archer).toBe(DEFAULT_CLASS_DATA.Archer);
    expect(DEFAULT_CLASS_DATA.Mage.defenseMultiplier).toBe(0.8);
    expect(Object.isFrozen(table.Mage)).toBe(true);
  });

  it('rejects unknown classes, unknown fields and bad numbers', () => {
    expect(() => createClassDataTable({ Paladin: {} })).toThrow(ClassDataError);
    try {
      createClassDataTable({ Mage: { defenseMultiplier: -1 }, Paladin: {} });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ClassDataError);
      if (!(error instanceof ClassDataError)) return;
      expect(error.issues).toEqual([
        'Mage.defenseMultiplier: Number must be greater than 0',
        'Paladin: Unknown class "Paladin"',
      ]);
    }
    expect(() => createClassDataTable({ Mage: { spellBaseCosts: [1, 2, 3] } })).toThrow(ClassDataError);
    expect(() => createClassDataTable({ Mage: { manaRegen: 4 } })).toThrow(ClassDataError);
    expect(() => createClassDataTable('mage')).toThrow(ClassDataError);
  });
});
