import MiniSearch from 'minisearch';
import type { CatalogSnapshot, NormalizedItem } from '@/domain/items/types';

const MAX_SUGGESTIONS = 3;

interface NameDoc {
  id: number;
  name: string;
  type: string;
}

export interface UnresolvedItemName {
  name: string;
  suggestions: string[];
}

export interface ItemNameResolution {
  resolved: NormalizedItem[];
  unresolved: UnresolvedItemName[];
}

export class ItemLookup {
  private readonly miniSearch: MiniSearch<NameDoc>;
  private readonly items: readonly NormalizedItem[];
  private readonly itemsByName: ReadonlyMap<string, NormalizedItem>;

  constructor(catalog: CatalogSnapshot) {
    this.items = catalog.items;
    this.itemsByName = catalog.itemsByName;
    this.miniSearch = new MiniSearch<NameDoc>({
      fields: ['name', 'type'],
      idField: 'id',
      searchOptions: {
        boost: { name: 4, type: 1 },
        prefix: true,
        fuzzy: 0.2,
        combineWith: 'OR',
      },
    });
    this.miniSearch.addAll(this.items.map<NameDoc>((item, index) => ({ id: index, name: item.name, type: item.type })));
  }

  get(name: string): NormalizedItem | undefined {
    return this.itemsByName.get(name.trim().toLowerCase());
  }

  suggest(text: string, limit = MAX_SUGGESTIONS): string[] {
    const query = text.trim();
    if (!query) return [];
    const names: string[] = [];
    for (const hit of this.miniSearch.search(query)) {
      const item = typeof hit.id === 'number' ? this.items[hit.id] : undefined;
      if (!item || names.includes(item.name)) continue;
      names.push(item.name);
      if (names.length >= limit) break;
    }
    return names;
  }
}

export function createItemLookup(catalog: CatalogSnapshot): ItemLookup {
  return new ItemLookup(catalog);
}

/** Exact, case-insensitive resolution; names that miss get up to three suggestions. */
export function resolveItemNames(lookup: ItemLookup, names: readonly string[]): ItemNameResolution {
  const resolved: NormalizedItem[] = [];
  const unresolved: UnresolvedItemName[] = [];
  for (const name of names) {
    const item = lookup.get(name);
    if (item) {
      if (!resolved.includes(item)) resolved.push(item);
    } else {
      unresolved.push({ name, suggestions: lookup.suggest(name) });
    }
  }
  return { resolved, unresolved };
}
