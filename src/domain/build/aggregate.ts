import type { Build, AggregatedStats } from '@/domain/build/types';
import { IDENTIFICATION_KEYS, ITEM_SLOTS, SKILL_STATS, emptyIdentifications, emptySkillVector } from '@/domain/items/types';

function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

/** Sums every known identification, base hp/mana and requirements over the equipped items. */
export function aggregateBuild(build: Build): AggregatedStats {
  const stats: AggregatedStats = {
    ...emptyIdentifications(),
    hp: 0,
    mana: 0,
    requirements: emptySkillVector(),
    itemCount: 0,
  };
  for (const slot of ITEM_SLOTS) {
    const item = build[slot];
    if (!item) continue;
    stats.itemCount += 1;
    stats.hp += finite(item.hp);
    stats.mana += finite(item.mana);
    for (const key of IDENTIFICATION_KEYS) {
      stats[key] += finite(item.identifications[key]);
    }
    for (const stat of SKILL_STATS) {
      stats.requirements[stat] += finite(item.requirements[stat]);
    }
  }
  return stats;
}
