import type { CatalogSnapshot, CharacterClass, Element, ItemCategoryKey, ItemTier, NormalizedItem } from '@/domain/items/types';
import {
  CLASS_WEAPON_TYPE,
  ELEMENT_DAMAGE_PCT_KEYS,
  ELEMENT_DEFENSE_PCT_KEYS,
  ELEMENT_STAT_KEYS,
  ITEM_CATEGORY_KEYS,
  itemCanBeWornByClass,
} from '@/domain/items/types';
import type { BuildConfig, ElementMode, ItemFilters, ItemStatKey, Playstyle } from '@/domain/autobuilder/types';
import { ITEM_STAT_KEYS } from '@/domain/autobuilder/types';

export const PLAYSTYLE_STATS: Record<Playstyle, readonly ItemStatKey[]> = {
  spellspam: ['sdPct', 'sdRaw', 'mr', 'ms', 'int', ...ELEMENT_DAMAGE_PCT_KEYS],
  melee: ['mdPct', 'mdRaw', 'atkTier', 'str', 'dex'],
  tank: ['hp', 'hpBonus', 'def', 'hprRaw', 'hprPct', ...ELEMENT_DEFENSE_PCT_KEYS],
  hybrid: ['sdPct', 'mdPct', 'hp', 'mr', 'str', 'dex', 'int', 'def', 'agi'],
};

const ELEMENT_MATCH_POINTS = 2;

export type SlotPools = Record<ItemCategoryKey, NormalizedItem[]>;

export function itemStatValue(item: NormalizedItem, key: ItemStatKey): number {
  switch (key) {
    case 'hp':
      return item.hp;
    case 'mana':
      return item.mana;
    case 'level':
      return item.level;
    default:
      return item.identifications[key];
  }
}

export function filterByClass(items: readonly NormalizedItem[], category: ItemCategoryKey, characterClass: CharacterClass): NormalizedItem[] {
  const weaponType = CLASS_WEAPON_TYPE[characterClass];
  return items.filter((item) => {
    if (category === 'weapon' && item.weapon?.type !== weaponType) return false;
    return itemCanBeWornByClass(item, characterClass);
  });
}

export function filterByLevel(items: readonly NormalizedItem[], [minLevel, maxLevel]: readonly [number, number]): NormalizedItem[] {
  return items.filter((item) => item.level >= minLevel && item.level <= maxLevel);
}

export function filterByTier(items: readonly NormalizedItem[], noMythics: boolean, allowedTiers: readonly ItemTier[] = []): NormalizedItem[] {
  return items.filter((item) => {
    if (noMythics && item.tier === 'Mythic') return false;
    return allowedTiers.length === 0 || allowedTiers.includes(item.tier);
  });
}

/** True when any of the items is named in the include list. */
export function hasIncludedItem(items: readonly NormalizedItem[], filters: Pick<ItemFilters, 'includeItems'>): boolean {
  if (filters.includeItems.length === 0) return false;
  const include = new Set(filters.includeItems.map((name) => name.trim().toLowerCase()));
  return items.some((item) => include.has(item.name.toLowerCase()));
}

/**
 * Name and stat filters. Included names only restrict the categories they
 * belong to, so pinning a helmet leaves the other slots open. `pinned` must
 * be decided on the unfiltered category; it defaults to the given items.
 */
export function applyItemFilters(
  items: readonly NormalizedItem[],
  filters: ItemFilters,
  pinned = hasIncludedItem(items, filters),
): NormalizedItem[] {
  const include = new Set(filters.includeItems.map((name) => name.trim().toLowerCase()));
  const exclude = new Set(filters.excludeItems.map((name) => name.trim().toLowerCase()));
  const pattern = filters.namePattern ? new RegExp(filters.namePattern, 'i') : null;

  return items.filter((item) => {
    const name = item.name.toLowerCase();
    if (pinned && !include.has(name)) return false;
    if (exclude.has(name)) return false;
    if (pattern && !pattern.test(item.name)) return false;
    for (const [key, min] of statBounds(filters.minStats)) {
      if (itemStatValue(item, key) < min) return false;
    }
    for (const [key, max] of statBounds(filters.maxStats)) {
      if (itemStatValue(item, key) > max) return false;
    }
    return true;
  });
}

function statBounds(bounds: Partial<Record<ItemStatKey, number>>): Array<[ItemStatKey, number]> {
  const entries: Array<[ItemStatKey, number]> = [];
  for (const key of ITEM_STAT_KEYS) {
    const value = bounds[key];
    if (typeof value === 'number') entries.push([key, value]);
  }
  return entries;
}

export function playstyleScore(item: NormalizedItem, playstyle: Playstyle): number {
  let score = 0;
  for (const key of PLAYSTYLE_STATS[playstyle]) {
    if (itemStatValue(item, key) > 0) score += 1;
  }
  return score;
}

export function prioritizeByPlaystyle(items: readonly NormalizedItem[], playstyle: Playstyle): NormalizedItem[] {
  return items
    .map((item) => ({ item, score: playstyleScore(item, playstyle) }))
    .sort((a, b) => b.score - a.score)
    .map(({ item }) => item);
}

export function elementScore(item: NormalizedItem, elements: readonly Element[], mode: ElementMode): number {
  let score = 0;
  for (const element of elements) {
    const keys = ELEMENT_STAT_KEYS[element];
    if (item.identifications[keys.damPct] > 0) score += ELEMENT_MATCH_POINTS;
    if (item.identifications[keys.defPct] > 0) score += ELEMENT_MATCH_POINTS;
  }
  if (score === 0 && mode === 'prioritize') return 1;
  return score;
}

/**
 * Orders items by affinity to the chosen elements. In `strict` mode items
 * with no affinity are dropped; in `prioritize` mode they stay, ranked last.
 * A no-op without elements.
 */
export function applyElementStage(items: readonly NormalizedItem[], elements: readonly Element[], mode: ElementMode): NormalizedItem[] {
  if (elements.length === 0) return [...items];
  return items
    .map((item) => ({ item, score: elementScore(item, elements, mode) }))
    .filter(({ score }) => score > 0)
    .sort((a, b) => b.score - a.score)
    .map(({ item }) => item);
}

export function filterSlotCandidates(items: readonly NormalizedItem[], category: ItemCategoryKey, config: BuildConfig): NormalizedItem[] {
  const pinned = hasIncludedItem(items, config.itemFilters);
  let pool = filterByClass(items, category, config.characterClass);
  pool = filterByLevel(pool, config.levelRange);
  pool = filterByTier(pool, config.noMythics, config.itemFilters.allowedTiers);
  pool = applyItemFilters(pool, config.itemFilters, pinned);
  pool = prioritizeByPlaystyle(pool, config.playstyle);
  pool = applyElementStage(pool, config.elements, config.elementMode);
  return pool.slice(0, config.maxItemsPerSlot);
}

/** Categories holding at least one included item, in slot order. */
export function pinnedCategories(catalog: CatalogSnapshot, filters: Pick<ItemFilters, 'includeItems'>): ItemCategoryKey[] {
  return ITEM_CATEGORY_KEYS.filter((category) => hasIncludedItem(catalog.itemsByCategory.get(category) ?? [], filters));
}

export function buildSlotPools(catalog: CatalogSnapshot, config: BuildConfig): SlotPools {
  const pool = (category: ItemCategoryKey) =>
    filterSlotCandidates(catalog.itemsByCategory.get(category) ?? [], category, config);
  return {
    helmet: pool('helmet'),
    chestplate: pool('chestplate'),
    leggings: pool('leggings'),
    boots: pool('boots'),
    ring: pool('ring'),
    bracelet: pool('bracelet'),
    necklace: pool('necklace'),
    weapon: pool('weapon'),
  };
}
