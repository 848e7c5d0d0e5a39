import type {
  ItemIdentifications,
  ItemSlot,
  NormalizedItem,
  SkillVector,
} from '@/domain/items/types';
import type { SpellCosts } from '@/domain/class-data/types';

export type Build = Record<ItemSlot, NormalizedItem | null>;

export interface AggregatedStats extends ItemIdentifications {
  hp: number;
  mana: number;
  /** Summed skill-point requirements, not bonuses. */
  requirements: SkillVector;
  itemCount: number;
}

export interface DamageBreakdown {
  spell: number;
  melee: number;
  poison: number;
  total: number;
}

export interface EffectiveHealth {
  totalHp: number;
  defenseEhp: number;
  agilityEhp: number;
  combinedEhp: number;
  defenseReduction: number;
  dodgeChance: number;
}

export interface DerivedStats {
  /** Spell damage figure; the one thresholds and scoring use. */
  dps: number;
  damage: DamageBreakdown;
  manaSustain: number;
  effectiveHp: EffectiveHealth;
  spellCosts: SpellCosts;
  cost: number;
  skillPoints: SkillVector;
  skillPointTotal: number;
  unusedSkillPoints: number;
}

export interface ScoredBuild {
  build: Build;
  aggregated: AggregatedStats;
  derived: DerivedStats;
  score: number;
  warnings: string[];
}

export const REJECTION_REASONS = [
  'ring_count',
  'slot_category',
  'weapon_type',
  'class_requirement',
  'skill_points',
  'min_dps',
  'min_mana_regen',
  'max_cost',
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export type ValidationErrorCode = RejectionReason | 'level_requirement';

export type ValidationWarningCode = 'quest_required' | 'untradeable' | 'mythic';

export interface BuildValidationIssue<Code extends string = ValidationErrorCode> {
  code: Code;
  slot?: ItemSlot;
  message: string;
}

export interface BuildValidationReport {
  valid: boolean;
  errors: BuildValidationIssue[];
  warnings: BuildValidationIssue<ValidationWarningCode>[];
  skillPoints: SkillVector;
}

export function createEmptyBuild(): Build {
  return {
    helmet: null,
    chestplate: null,
    leggings: null,
    boots: null,
    ring1: null,
    ring2: null,
    bracelet: null,
    necklace: null,
    weapon: null,
  };
}
