import type { DerivedStats } from '@/domain/build/types';
import type { CustomScoringFn, ScoringInput, ScoringWeights } from '@/domain/autobuilder/types';

export function defaultScore(derived: DerivedStats, weights: ScoringWeights): number {
  return (
    derived.dps * weights.dps +
    derived.effectiveHp.combinedEhp * weights.ehp +
    derived.manaSustain * weights.mana +
    derived.unusedSkillPoints * weights.bonus
  );
}

export type ScoreOutcome =
  | { score: number; fallback: false }
  | { score: number; fallback: true; reason: string };

/**
 * Scores with the caller's function when given one. A throw or a non-finite
 * result falls back to {@link defaultScore}; the outcome says why.
 */
export function scoreCandidate(input: ScoringInput, customScoringFn: CustomScoringFn | null): ScoreOutcome {
  if (!customScoringFn) {
    return { score: defaultScore(input.derived, input.weights), fallback: false };
  }
  let reason: string;
  try {
    const score = customScoringFn(input);
    if (Number.isFinite(score)) return { score, fallback: false };
    reason = `custom scoring returned ${String(score)}`;
  } catch (error) {
    reason = `custom scoring threw: ${error instanceof Error ? error.message : String(error)}`;
  }
  return { score: defaultScore(input.derived, input.weights), fallback: true, reason };
}
