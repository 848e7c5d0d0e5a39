import { z } from 'zod';
import { CatalogPayloadError, formatZodIssues } from '@/lib/errors';
import type {
  AttackSpeed,
  CatalogSnapshot,
  CharacterClass,
  DamageElement,
  DamageRange,
  ItemCategoryKey,
  ItemIdentifications,
  ItemTier,
  NormalizedItem,
  SkillVector,
  WeaponProfile,
} from '@/domain/items/types';
import {
  DAMAGE_ELEMENTS,
  IDENTIFICATION_KEYS,
  ITEM_CATEGORY_KEYS,
  MAX_LEVEL,
  emptyIdentifications,
  getClassFromWeaponType,
  isAttackSpeed,
  isItemTier,
  isWeaponType,
  itemCategoryFromRaw,
  parseCharacterClass,
} from '@/domain/items/types';

export type ItemIngestErrorCode =
  | 'not_an_object'
  | 'missing_name'
  | 'unknown_type'
  | 'unknown_tier'
  | 'invalid_level'
  | 'remapped'
  | 'duplicate_name';

export interface ItemIngestError {
  code: ItemIngestErrorCode;
  /** Name of the offending record when it has one. */
  name?: string;
  message: string;
}

export type ItemIngestResult =
  | { ok: true; item: NormalizedItem; tierDefaulted: boolean }
  | { ok: false; error: ItemIngestError };

export const MIN_ITEM_LEVEL = 1;
export const MAX_ITEM_LEVEL = MAX_LEVEL;

const rawRecordSchema = z.record(z.string(), z.unknown());

// Raw damage keys as they appear in community item dumps.
const DAMAGE_KEYS: Record<DamageElement, string> = {
  neutral: 'nDam',
  earth: 'eDam',
  thunder: 'tDam',
  water: 'wDam',
  fire: 'fDam',
  air: 'aDam',
};

// Older dumps spell attack speeds with spaces ("Very Fast").
const ATTACK_SPEED_ALIASES: Record<string, AttackSpeed> = {
  'super slow': 'SUPER_SLOW',
  'very slow': 'VERY_SLOW',
  slow: 'SLOW',
  normal: 'NORMAL',
  fast: 'FAST',
  'very fast': 'VERY_FAST',
  'super fast': 'SUPER_FAST',
};

function asNumber(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return 0;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function parseDamageRange(value: unknown): DamageRange | null {
  if (Array.isArray(value) && value.length === 2) {
    const min = asNumber(value[0]);
    const max = asNumber(value[1]);
    return min === 0 && max === 0 ? null : { min, max };
  }
  const text = asString(value).trim();
  const match = /^(\d+(?:\.\d+)?)\s*-\s*(\d+(?:\.\d+)?)$/.exec(text);
  if (!match) return null;
  const min = Number(match[1]);
  const max = Number(match[2]);
  if (min === 0 && max === 0) return null;
  return { min, max };
}

function normalizeAttackSpeed(raw: unknown): AttackSpeed {
  const text = asString(raw).trim();
  const upper = text.toUpperCase().replace(/\s+/g, '_');
  if (isAttackSpeed(upper)) return upper;
  return ATTACK_SPEED_ALIASES[text.toLowerCase()] ?? 'NORMAL';
}

// null for a tier that is present but unrecognised; missing tiers read as Normal.
function normalizeTier(raw: Record<string, unknown>): { tier: ItemTier; defaulted: boolean } | null {
  const text = (asString(raw.tier) || asString(raw.rarity)).trim();
  if (!text) return { tier: 'Normal', defaulted: true };
  const titled = text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
  return isItemTier(titled) ? { tier: titled, defaulted: false } : null;
}

function normalizeClassReq(raw: unknown, type: string): CharacterClass | null {
  const text = asString(raw).trim();
  if (!text) {
    return getClassFromWeaponType(type);
  }
  return parseCharacterClass(text) ?? getClassFromWeaponType(type);
}

function pickRequirements(raw: Record<string, unknown>): SkillVector {
  return {
    str: asNumber(raw.strReq),
    dex: asNumber(raw.dexReq),
    int: asNumber(raw.intReq),
    def: asNumber(raw.defReq),
    agi: asNumber(raw.agiReq),
  };
}

function pickIdentifications(raw: Record<string, unknown>): ItemIdentifications {
  const result = emptyIdentifications();
  for (const key of IDENTIFICATION_KEYS) {
    result[key] = asNumber(raw[key]);
  }
  // Some dumps only carry a single combined regen field.
  if (result.hprRaw === 0 && typeof raw.hpr !== 'undefined') {
    result.hprRaw = asNumber(raw.hpr);
  }
  return result;
}

function pickWeaponProfile(raw: Record<string, unknown>, type: string): WeaponProfile | undefined {
  if (!isWeaponType(type)) return undefined;
  const damages: WeaponProfile['damages'] = {};
  for (const element of DAMAGE_ELEMENTS) {
    const range = parseDamageRange(raw[DAMAGE_KEYS[element]]);
    if (range) damages[element] = range;
  }
  return {
    type,
    attackSpeed: normalizeAttackSpeed(raw.atkSpd),
    damages,
  };
}

function ingestError(code: ItemIngestErrorCode, message: string, name?: string): ItemIngestResult {
  return { ok: false, error: name ? { code, name, message } : { code, message } };
}

/**
 * Turns one raw item record into a typed item. Never throws: malformed records
 * come back as an error result so the caller can report and skip them.
 */
export function normalizeItem(input: unknown): ItemIngestResult {
  const parsed = rawRecordSchema.safeParse(input);
  if (!parsed.success) {
    return ingestError('not_an_object', 'Item record is not an object.');
  }
  const raw = parsed.data;
  const name = (asString(raw.displayName) || asString(raw.name)).trim();
  if (!name) {
    return ingestError('missing_name', 'Item record has no name.');
  }
  if (typeof raw.remapID !== 'undefined') {
    return ingestError('remapped', `${name} is a remapped legacy entry.`, name);
  }

  const type = asString(raw.type).trim().toLowerCase();
  const category = itemCategoryFromRaw(type, asString(raw.category).toLowerCase());
  if (!category) {
    return ingestError('unknown_type', `${name} has unknown item type "${type}".`, name);
  }

  const level = typeof raw.lvl === 'undefined' ? MIN_ITEM_LEVEL : asNumber(raw.lvl);
  if (!Number.isInteger(level) || level < MIN_ITEM_LEVEL || level > MAX_ITEM_LEVEL) {
    return ingestError('invalid_level', `${name} has invalid level ${String(raw.lvl)} (must be ${MIN_ITEM_LEVEL}-${MAX_ITEM_LEVEL}).`, name);
  }

  const tier = normalizeTier(raw);
  if (!tier) {
    return ingestError('unknown_tier', `${name} has unknown tier "${asString(raw.tier) || asString(raw.rarity)}".`, name);
  }

  const quest = asString(raw.quest).trim();
  const untradeable = raw.untradeable === true || asString(raw.drop).toLowerCase() === 'never';

  const item: NormalizedItem = {
    name,
    category,
    type,
    tier: tier.tier,
    level,
    classReq: normalizeClassReq(raw.classReq, type),
    requirements: pickRequirements(raw),
    hp: asNumber(raw.hp),
    mana: asNumber(raw.mana),
    identifications: pickIdentifications(raw),
    questRequired: quest || null,
    untradeable,
  };
  const weapon = pickWeaponProfile(raw, type);
  if (weapon) item.weapon = weapon;
  return { ok: true, item, tierDefaulted: tier.defaulted };
}

export interface CatalogIngestReport {
  total: number;
  accepted: number;
  rejected: ItemIngestError[];
  byCategory: Record<ItemCategoryKey, number>;
  byTier: Partial<Record<ItemTier, number>>;
  /** Accepted items that carried no tier and were read as Normal. */
  defaultedTiers: string[];
}

export interface CatalogIngestResult {
  catalog: CatalogSnapshot;
  report: CatalogIngestReport;
}

const catalogPayloadSchema = z.union([
  z.array(z.unknown()),
  z.object({ items: z.array(z.unknown()) }).passthrough(),
]);

/**
 * Builds a catalog snapshot from a raw item dump (a bare array or `{ items }`).
 * Bad records are skipped and listed in the report; duplicate names keep the
 * first record seen. Throws {@link CatalogPayloadError} only when the payload
 * itself has the wrong shape.
 */
export function normalizeCatalog(payload: unknown): CatalogIngestResult {
  const parsed = catalogPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new CatalogPayloadError(formatZodIssues(parsed.error));
  }
  const records = Array.isArray(parsed.data) ? parsed.data : parsed.data.items;

  const items: NormalizedItem[] = [];
  const itemsByName = new Map<string, NormalizedItem>();
  const itemsByCategory = new Map<ItemCategoryKey, NormalizedItem[]>(ITEM_CATEGORY_KEYS.map((key): [ItemCategoryKey, NormalizedItem[]] => [key, []]));
  const rejected: ItemIngestError[] = [];
  const byCategory: Record<ItemCategoryKey, number> = {
    helmet: 0,
    chestplate: 0,
    leggings: 0,
    boots: 0,
    ring: 0,
    bracelet: 0,
    necklace: 0,
    weapon: 0,
  };
  const byTier: Partial<Record<ItemTier, number>> = {};
  const defaultedTiers: string[] = [];

  for (const record of records) {
    const result = normalizeItem(record);
    if (!result.ok) {
      rejected.push(result.error);
      continue;
    }
    const { item } = result;
    const key = item.name.toLowerCase();
    if (itemsByName.has(key)) {
      rejected.push({ code: 'duplicate_name', name: item.name, message: `${item.name} appears more than once; keeping the first record.` });
      continue;
    }
    items.push(item);
    itemsByName.set(key, item);
    itemsByCategory.get(item.category)?.push(item);
    byCategory[item.category] += 1;
    byTier[item.tier] = (byTier[item.tier] ?? 0) + 1;
    if (result.tierDefaulted) defaultedTiers.push(item.name);
  }

  return {
    catalog: { items, itemsByName, itemsByCategory },
    report: {
      total: records.length,
      accepted: items.length,
      rejected,
      byCategory,
      byTier,
      defaultedTiers,
    },
  };
}
