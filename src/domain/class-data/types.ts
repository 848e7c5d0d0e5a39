import type { CharacterClass, Element } from '@/domain/items/types';

export type SpellCosts = readonly [number, number, number, number];

/** Spell name to the share (percent) of its damage converted to each element. */
export type SpellConversionTable = Readonly<Record<string, Readonly<Partial<Record<Element, number>>>>>;

export interface ClassData {
  readonly baseSpellMultiplier: number;
  readonly spellConversions: SpellConversionTable;
  /** Multiplies incoming damage; lower means tankier. */
  readonly defenseMultiplier: number;
  readonly healthPerLevel: number;
  readonly manaPerLevel: number;
  readonly spellBaseCosts: SpellCosts;
}

export type ClassDataTable = Readonly<Record<CharacterClass, ClassData>>;
