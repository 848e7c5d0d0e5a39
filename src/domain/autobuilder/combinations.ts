import type { NormalizedItem } from '@/domain/items/types';
import type { Build } from '@/domain/build/types';
import type { SlotPools } from '@/domain/autobuilder/slot-filter';

export type RingPair = readonly [NormalizedItem | null, NormalizedItem | null];

const EMPTY_RING_PAIR: RingPair = [null, null];

/** Unordered pairs of distinct rings, or a single empty pair when fewer than two are available. */
export function ringPairs(rings: readonly NormalizedItem[]): RingPair[] {
  if (rings.length < 2) return [EMPTY_RING_PAIR];
  const pairs: RingPair[] = [];
  for (let i = 0; i < rings.length - 1; i++) {
    for (let j = i + 1; j < rings.length; j++) {
      pairs.push([rings[i], rings[j]]);
    }
  }
  return pairs;
}

function optionalSlot(items: readonly NormalizedItem[]): ReadonlyArray<NormalizedItem | null> {
  return items.length > 0 ? items : [null];
}

/** Number of builds {@link enumerateBuilds} will yield for these pools. */
export function countCombinations(pools: SlotPools): number {
  return (
    pools.weapon.length *
    pools.helmet.length *
    pools.chestplate.length *
    pools.leggings.length *
    pools.boots.length *
    ringPairs(pools.ring).length *
    optionalSlot(pools.bracelet).length *
    optionalSlot(pools.necklace).length
  );
}

/**
 * Lazily walks weapon × helmet × chestplate × leggings × boots × ring pair ×
 * bracelet × necklace, necklace varying fastest. Each yielded build is a
 * fresh object.
 */
export function* enumerateBuilds(pools: SlotPools): Generator<Build, void, undefined> {
  const rings = ringPairs(pools.ring);
  const bracelets = optionalSlot(pools.bracelet);
  const necklaces = optionalSlot(pools.necklace);
  for (const weapon of pools.weapon) {
    for (const helmet of pools.helmet) {
      for (const chestplate of pools.chestplate) {
        for (const leggings of pools.leggings) {
          for (const boots of pools.boots) {
            for (const [ring1, ring2] of rings) {
              for (const bracelet of bracelets) {
                for (const necklace of necklaces) {
                  yield { helmet, chestplate, leggings, boots, ring1, ring2, bracelet, necklace, weapon };
                }
              }
            }
          }
        }
      }
    }
  }
}
