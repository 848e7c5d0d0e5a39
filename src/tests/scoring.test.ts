import { describe, expect, it } from 'vitest';
import { defaultScore, scoreCandidate } from '@/domain/autobuilder/scoring';
import { TopNSelector } from '@/domain/autobuilder/top-n';
import { PLAYSTYLE_WEIGHTS } from '@/domain/autobuilder/types';
import { aggregateBuild } from '@/domain/build/aggregate';
import { deriveBuildStats } from '@/domain/build/build-metrics';
import { DEFAULT_CLASS_DATA } from '@/domain/class-data/class-data';
import { makeBuild, makeItem } from '@/tests/helpers';

describe('defaultScore', () => {
  const build = makeBuild({ weapon: makeItem({ name: 'Score Wand', type: 'wand', nDam: '100-200', intReq: 50 }) });
  const aggregated = aggregateBuild(build);
  const derived = deriveBuildStats(build, aggregated, { classData: DEFAULT_CLASS_DATA.Mage, characterLevel: 106, maxSkillPoints: 200 });

  it('weights dps, ehp, mana and unused skill points', () => {
    const weights = { dps: 2, ehp: 0.5, mana: 10, bonus: 1 };
    const expected = derived.dps * 2 + derived.effectiveHp.combinedEhp * 0.5 + derived.manaSustain * 10 + 150;
    expect(defaultScore(derived, weights)).toBeCloseTo(expected, 8);
    expect(defaultScore(derived, { dps: 0, ehp: 0, mana: 0, bonus: 1 })).toBe(150);
  });

  it('uses the custom function when it returns a finite number', () => {
    const outcome = scoreCandidate({ build, aggregated, derived, weights: PLAYSTYLE_WEIGHTS.spellspam }, () => 42);
    expect(outcome).toEqual({ score: 42, fallback: false });
  });

  it('falls back on a throw or a non-finite result', () => {
    const input = { build, aggregated, derived, weights: PLAYSTYLE_WEIGHTS.melee };
    const fallbackScore = defaultScore(derived, PLAYSTYLE_WEIGHTS.melee);
    expect(
      scoreCandidate(input, () => {
        throw new Error('boom');
      }),
    ).toEqual({ score: fallbackScore, fallback: true, reason: 'custom scoring threw: boom' });
    expect(scoreCandidate(input, () => Number.NaN)).toEqual({ score: fallbackScore, fallback: true, reason: 'custom scoring returned NaN' });
    expect(scoreCandidate(input, () => Number.POSITIVE_INFINITY).fallback).toBe(true);
  });
});

describe('TopNSelector', () => {
  it('keeps the best entries in descending order', () => {
    const selector = new TopNSelector<string>(3);
    for (const [value, score] of [['a', 1], ['b', 5], ['c', 3], ['d', 4], ['e', 2]] as const) {
      selector.offer(value, score);
    }
    expect(selector.results().map((entry) => entry.value)).toEqual(['b', 'd', 'c']);
  });

  it('breaks ties by arrival order', () => {
    const selector = new TopNSelector<string>(2);
    expect(selector.offer('first', 7)).toBe(true);
    expect(selector.offer('second', 7)).toBe(true);
    expect(selector.offer('third', 7)).toBe(false);
    expect(selector.offer('best', 9)).toBe(true);
    expect(selector.results()).toEqual([
      { value: 'best', score: 9 },
      { value: 'first', score: 7 },
    ]);
  });

  it('holds nothing with a zero limit', () => {
    const selector = new TopNSelector<string>(0);
    expect(selector.offer('x', 100)).toBe(false);
    expect(selector.size).toBe(0);
  });
});
