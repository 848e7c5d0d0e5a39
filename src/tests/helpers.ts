import { createConsola } from 'consola';
import type { LogObject } from 'consola';
import { normalizeCatalog, normalizeItem } from '@/domain/items/normalize';
import type { NormalizedItem } from '@/domain/items/types';
import type { Build } from '@/domain/build/types';
import { createEmptyBuild } from '@/domain/build/types';
import type { Logger } from '@/lib/logger';

export function makeTestCatalog(payloadItems: Array<Record<string, unknown>>) {
  return normalizeCatalog({ items: payloadItems }).catalog;
}

export function rawItem(input: Partial<Record<string, unknown>> & { name: string; type: string; lvl?: number; tier?: string }) {
  return {
    lvl: 100,
    tier: 'Rare',
    ...input,
  };
}

export function makeItem(input: Parameters<typeof rawItem>[0]): NormalizedItem {
  const result = normalizeItem(rawItem(input));
  if (!result.ok) throw new Error(`Fixture ${input.name} failed to normalize: ${result.error.message}`);
  return result.item;
}

export function makeBuild(slots: Partial<Build>): Build {
  return { ...createEmptyBuild(), ...slots };
}

/** One candidate per mandatory slot plus two rings, all wearable by a level 106 Mage. */
export function mageKitItems() {
  return [
    rawItem({ name: 'Sage Wand', type: 'wand', nDam: '100-200', atkSpd: 'NORMAL' }),
    rawItem({ name: 'Sage Hood', type: 'helmet', hp: 500, intReq: 20, sdPct: 10 }),
    rawItem({ name: 'Sage Robe', type: 'chestplate', hp: 800 }),
    rawItem({ name: 'Sage Leggings', type: 'leggings', hp: 600 }),
    rawItem({ name: 'Sage Boots', type: 'boots', hp: 400 }),
    rawItem({ name: 'Sage Ring', type: 'ring', mr: 2 }),
    rawItem({ name: 'Ember Ring', type: 'ring', fDamPct: 5 }),
  ];
}

export interface RecordingLogger {
  logger: Logger;
  records: LogObject[];
}

export function recordingLogger(): RecordingLogger {
  const records: LogObject[] = [];
  const logger = createConsola({
    level: 5,
    reporters: [
      {
        log: (logObj) => {
          records.push(logObj);
        },
      },
    ],
  });
  return { logger, records };
}
