export const ITEM_CATEGORY_KEYS = [
  'helmet',
  'chestplate',
  'leggings',
  'boots',
  'ring',
  'bracelet',
  'necklace',
  'weapon',
] as const;

export type ItemCategoryKey = (typeof ITEM_CATEGORY_KEYS)[number];

export const ITEM_SLOTS = [
  'helmet',
  'chestplate',
  'leggings',
  'boots',
  'ring1',
  'ring2',
  'bracelet',
  'necklace',
  'weapon',
] as const;

export type ItemSlot = (typeof ITEM_SLOTS)[number];

/** Slots that must be filled for a build to be generated at all. */
export const MANDATORY_CATEGORIES = ['helmet', 'chestplate', 'leggings', 'boots', 'weapon'] as const satisfies readonly ItemCategoryKey[];

export const MAX_LEVEL = 106;

export const CHARACTER_CLASSES = ['Warrior', 'Assassin', 'Mage', 'Archer', 'Shaman'] as const;

export type CharacterClass = (typeof CHARACTER_CLASSES)[number];

export const ITEM_TIERS = ['Normal', 'Unique', 'Rare', 'Legendary', 'Fabled', 'Mythic', 'Set'] as const;

export type ItemTier = (typeof ITEM_TIERS)[number];

export const WEAPON_TYPES = ['wand', 'bow', 'spear', 'dagger', 'relik'] as const;

export type WeaponType = (typeof WEAPON_TYPES)[number];

export const ATTACK_SPEEDS = ['SUPER_SLOW', 'VERY_SLOW', 'SLOW', 'NORMAL', 'FAST', 'VERY_FAST', 'SUPER_FAST'] as const;

export type AttackSpeed = (typeof ATTACK_SPEEDS)[number];

export const ELEMENTS = ['earth', 'thunder', 'water', 'fire', 'air'] as const;

export type Element = (typeof ELEMENTS)[number];

/** Neutral plus the five elements; only weapons deal neutral damage. */
export const DAMAGE_ELEMENTS = ['neutral', ...ELEMENTS] as const;

export type DamageElement = (typeof DAMAGE_ELEMENTS)[number];

export const SKILL_STATS = ['str', 'dex', 'int', 'def', 'agi'] as const;

export type SkillStat = (typeof SKILL_STATS)[number];

export type SkillVector = Record<SkillStat, number>;

export const ELEMENT_DAMAGE_PCT_KEYS = ['eDamPct', 'tDamPct', 'wDamPct', 'fDamPct', 'aDamPct'] as const;
export const ELEMENT_DAMAGE_RAW_KEYS = ['eDamRaw', 'tDamRaw', 'wDamRaw', 'fDamRaw', 'aDamRaw'] as const;
export const ELEMENT_DEFENSE_PCT_KEYS = ['eDefPct', 'tDefPct', 'wDefPct', 'fDefPct', 'aDefPct'] as const;

export const ELEMENT_STAT_KEYS: Record<Element, { damPct: IdentificationKey; defPct: IdentificationKey }> = {
  earth: { damPct: 'eDamPct', defPct: 'eDefPct' },
  thunder: { damPct: 'tDamPct', defPct: 'tDefPct' },
  water: { damPct: 'wDamPct', defPct: 'wDefPct' },
  fire: { damPct: 'fDamPct', defPct: 'fDefPct' },
  air: { damPct: 'aDamPct', defPct: 'aDefPct' },
};

/**
 * Every identification the engine knows about. The aggregator sums exactly
 * this set; anything else on a raw record is ignored.
 */
export const IDENTIFICATION_KEYS = [
  'hpBonus',
  'hprRaw',
  'hprPct',
  'mr',
  'ms',
  'sdRaw',
  'sdPct',
  'mdRaw',
  'mdPct',
  'ls',
  'poison',
  'thorns',
  'ref',
  'expd',
  'spd',
  'atkTier',
  ...ELEMENT_DAMAGE_PCT_KEYS,
  ...ELEMENT_DAMAGE_RAW_KEYS,
  ...ELEMENT_DEFENSE_PCT_KEYS,
  ...SKILL_STATS,
  'spRaw1',
  'spRaw2',
  'spRaw3',
  'spRaw4',
  'spPct1',
  'spPct2',
  'spPct3',
  'spPct4',
] as const;

export type IdentificationKey = (typeof IDENTIFICATION_KEYS)[number];

export type ItemIdentifications = Record<IdentificationKey, number>;

export interface DamageRange {
  min: number;
  max: number;
}

export interface WeaponProfile {
  type: WeaponType;
  attackSpeed: AttackSpeed;
  /** Only elements the record actually lists; absent elements deal nothing. */
  damages: Partial<Record<DamageElement, DamageRange>>;
}

export interface NormalizedItem {
  name: string;
  category: ItemCategoryKey;
  /** Raw item type, e.g. `helmet` or `wand`. */
  type: string;
  tier: ItemTier;
  level: number;
  classReq: CharacterClass | null;
  requirements: SkillVector;
  hp: number;
  mana: number;
  identifications: ItemIdentifications;
  /** Present only on weapons. */
  weapon?: WeaponProfile;
  questRequired: string | null;
  untradeable: boolean;
}

export interface CatalogSnapshot {
  items: readonly NormalizedItem[];
  itemsByName: ReadonlyMap<string, NormalizedItem>;
  itemsByCategory: ReadonlyMap<ItemCategoryKey, readonly NormalizedItem[]>;
}

export const CLASS_WEAPON_TYPE: Record<CharacterClass, WeaponType> = {
  Warrior: 'spear',
  Assassin: 'dagger',
  Mage: 'wand',
  Archer: 'bow',
  Shaman: 'relik',
};

export const WEAPON_CLASS_BY_TYPE: Record<WeaponType, CharacterClass> = {
  spear: 'Warrior',
  dagger: 'Assassin',
  wand: 'Mage',
  bow: 'Archer',
  relik: 'Shaman',
};

export const slotToCategory = (slot: ItemSlot): ItemCategoryKey =>
  slot === 'ring1' || slot === 'ring2' ? 'ring' : slot;

export function isWeaponType(value: string): value is WeaponType {
  return (WEAPON_TYPES as readonly string[]).includes(value);
}

export function isItemTier(value: string): value is ItemTier {
  return (ITEM_TIERS as readonly string[]).includes(value);
}

export function isAttackSpeed(value: string): value is AttackSpeed {
  return (ATTACK_SPEEDS as readonly string[]).includes(value);
}

export function parseCharacterClass(value: string): CharacterClass | null {
  const lowered = value.trim().toLowerCase();
  return CHARACTER_CLASSES.find((characterClass) => characterClass.toLowerCase() === lowered) ?? null;
}

export function getClassFromWeaponType(type: string): CharacterClass | null {
  return isWeaponType(type) ? WEAPON_CLASS_BY_TYPE[type] : null;
}

export function itemCategoryFromRaw(rawType: string, rawCategory: string): ItemCategoryKey | null {
  if (isWeaponType(rawType)) return 'weapon';
  const category = ITEM_CATEGORY_KEYS.find((key) => key === rawType);
  if (category) return category;
  if (rawCategory === 'weapon') return 'weapon';
  return null;
}

export function slotAcceptsItem(slot: ItemSlot, item: Pick<NormalizedItem, 'category'>): boolean {
  return slotToCategory(slot) === item.category;
}

export function itemCanBeWornByClass(item: NormalizedItem, characterClass: CharacterClass | null): boolean {
  if (!characterClass) return true;
  if (item.weapon && item.weapon.type !== CLASS_WEAPON_TYPE[characterClass]) return false;
  if (!item.classReq) return true;
  return item.classReq === characterClass;
}

export function emptySkillVector(): SkillVector {
  return { str: 0, dex: 0, int: 0, def: 0, agi: 0 };
}

export function emptyIdentifications(): ItemIdentifications {
  return {
    hpBonus: 0,
    hprRaw: 0,
    hprPct: 0,
    mr: 0,
    ms: 0,
    sdRaw: 0,
    sdPct: 0,
    mdRaw: 0,
    mdPct: 0,
    ls: 0,
    poison: 0,
    thorns: 0,
    ref: 0,
    expd: 0,
    spd: 0,
    atkTier: 0,
    eDamPct: 0,
    tDamPct: 0,
    wDamPct: 0,
    fDamPct: 0,
    aDamPct: 0,
    eDamRaw: 0,
    tDamRaw: 0,
    wDamRaw: 0,
    fDamRaw: 0,
    aDamRaw: 0,
    eDefPct: 0,
    tDefPct: 0,
    wDefPct: 0,
    fDefPct: 0,
    aDefPct: 0,
    str: 0,
    dex: 0,
    int: 0,
    def: 0,
    agi: 0,
    spRaw1: 0,
    spRaw2: 0,
    spRaw3: 0,
    spRaw4: 0,
    spPct1: 0,
    spPct2: 0,
    spPct3: 0,
    spPct4: 0,
  };
}

export function skillVectorTotal(vector: SkillVector): number {
  return vector.str + vector.dex + vector.int + vector.def + vector.agi;
}
