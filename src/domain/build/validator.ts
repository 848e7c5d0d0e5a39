import type { CharacterClass, SkillVector } from '@/domain/items/types';
import {
  CLASS_WEAPON_TYPE,
  ITEM_SLOTS,
  MAX_LEVEL,
  SKILL_STATS,
  emptySkillVector,
  skillVectorTotal,
  slotAcceptsItem,
  slotToCategory,
} from '@/domain/items/types';
import type { ClassDataTable } from '@/domain/class-data/types';
import { DEFAULT_CLASS_DATA } from '@/domain/class-data/class-data';
import { aggregateBuild } from '@/domain/build/aggregate';
import { deriveBuildStats } from '@/domain/build/build-metrics';
import type {
  Build,
  BuildValidationIssue,
  BuildValidationReport,
  DerivedStats,
  RejectionReason,
  ValidationWarningCode,
} from '@/domain/build/types';

export interface BuildConstraints {
  characterClass: CharacterClass;
  maxSkillPoints: number;
  minDps: number;
  minManaRegen: number;
  maxCost: number | null;
}

export interface ValidateBuildOptions extends Partial<Omit<BuildConstraints, 'characterClass'>> {
  characterClass: CharacterClass;
  characterLevel?: number;
  classData?: ClassDataTable;
}

export const DEFAULT_SKILL_POINT_BUDGET = 200;

type StructuralIssue = BuildValidationIssue<RejectionReason>;

export function sumRequirements(build: Build): SkillVector {
  const totals = emptySkillVector();
  for (const slot of ITEM_SLOTS) {
    const item = build[slot];
    if (!item) continue;
    for (const stat of SKILL_STATS) {
      totals[stat] += item.requirements[stat];
    }
  }
  return totals;
}

function collectStructuralIssues(build: Build, constraints: Pick<BuildConstraints, 'characterClass' | 'maxSkillPoints'>, firstOnly: boolean): StructuralIssue[] {
  const issues: StructuralIssue[] = [];
  const push = (issue: StructuralIssue) => {
    issues.push(issue);
    return firstOnly;
  };

  if ((build.ring1 === null) !== (build.ring2 === null)) {
    if (push({ code: 'ring_count', message: 'Rings must be worn in pairs or not at all.' })) return issues;
  }

  for (const slot of ITEM_SLOTS) {
    const item = build[slot];
    if (!item || slotAcceptsItem(slot, item)) continue;
    if (push({ code: 'slot_category', slot, message: `${item.name} (${item.category}) cannot go in the ${slotToCategory(slot)} slot.` })) return issues;
  }

  const weapon = build.weapon;
  const expectedWeapon = CLASS_WEAPON_TYPE[constraints.characterClass];
  if (weapon && weapon.weapon?.type !== expectedWeapon) {
    if (push({ code: 'weapon_type', slot: 'weapon', message: `${constraints.characterClass} needs a ${expectedWeapon}; ${weapon.name} is a ${weapon.type}.` })) return issues;
  }

  for (const slot of ITEM_SLOTS) {
    const item = build[slot];
    if (!item?.classReq || item.classReq === constraints.characterClass) continue;
    if (push({ code: 'class_requirement', slot, message: `${item.name} is restricted to ${item.classReq}.` })) return issues;
  }

  const requirements = sumRequirements(build);
  for (const stat of SKILL_STATS) {
    if (requirements[stat] <= constraints.maxSkillPoints) continue;
    if (push({ code: 'skill_points', message: `${stat} requirements total ${requirements[stat]}, above the ${constraints.maxSkillPoints} point budget.` })) return issues;
  }
  const total = skillVectorTotal(requirements);
  if (total > constraints.maxSkillPoints) {
    push({ code: 'skill_points', message: `Requirements total ${total} skill points, above the ${constraints.maxSkillPoints} point budget.` });
  }
  return issues;
}

function collectThresholdIssues(derived: DerivedStats, constraints: Pick<BuildConstraints, 'minDps' | 'minManaRegen' | 'maxCost'>): StructuralIssue[] {
  const issues: StructuralIssue[] = [];
  if (derived.dps < constraints.minDps) {
    issues.push({ code: 'min_dps', message: `DPS ${derived.dps.toFixed(1)} is below the minimum of ${constraints.minDps}.` });
  }
  if (derived.manaSustain < constraints.minManaRegen) {
    issues.push({ code: 'min_mana_regen', message: `Mana sustain ${derived.manaSustain.toFixed(2)} is below the minimum of ${constraints.minManaRegen}.` });
  }
  if (constraints.maxCost !== null && derived.cost > constraints.maxCost) {
    issues.push({ code: 'max_cost', message: `Build cost ${derived.cost.toFixed(1)} exceeds the maximum of ${constraints.maxCost}.` });
  }
  return issues;
}

/** First structural or skill-point problem with the build, or null when it passes. */
export function checkBuildStructure(build: Build, constraints: Pick<BuildConstraints, 'characterClass' | 'maxSkillPoints'>): StructuralIssue | null {
  return collectStructuralIssues(build, constraints, true)[0] ?? null;
}

/** First threshold the derived stats miss, or null. */
export function checkBuildThresholds(derived: DerivedStats, constraints: Pick<BuildConstraints, 'minDps' | 'minManaRegen' | 'maxCost'>): StructuralIssue | null {
  return collectThresholdIssues(derived, constraints)[0] ?? null;
}

export function isValid(build: Build, constraints: BuildConstraints, classData: ClassDataTable = DEFAULT_CLASS_DATA, characterLevel = MAX_LEVEL): boolean {
  if (checkBuildStructure(build, constraints)) return false;
  const derived = deriveBuildStats(build, aggregateBuild(build), {
    classData: classData[constraints.characterClass],
    characterLevel,
    maxSkillPoints: constraints.maxSkillPoints,
  });
  return checkBuildThresholds(derived, constraints) === null;
}

export function collectBuildWarnings(build: Build): BuildValidationIssue<ValidationWarningCode>[] {
  const warnings: BuildValidationIssue<ValidationWarningCode>[] = [];
  for (const slot of ITEM_SLOTS) {
    const item = build[slot];
    if (!item) continue;
    if (item.questRequired) {
      warnings.push({ code: 'quest_required', slot, message: `${item.name} requires the quest "${item.questRequired}".` });
    }
    if (item.untradeable) {
      warnings.push({ code: 'untradeable', slot, message: `${item.name} is untradeable.` });
    }
    if (item.tier === 'Mythic') {
      warnings.push({ code: 'mythic', slot, message: `${item.name} is Mythic.` });
    }
  }
  return warnings;
}

/**
 * Full report for a hand-assembled build: every rule violation rather than
 * the first one, item level against the character level, and the soft
 * warnings generated builds carry.
 */
export function validateBuild(build: Build, options: ValidateBuildOptions): BuildValidationReport {
  const characterLevel = options.characterLevel ?? MAX_LEVEL;
  const constraints: BuildConstraints = {
    characterClass: options.characterClass,
    maxSkillPoints: options.maxSkillPoints ?? DEFAULT_SKILL_POINT_BUDGET,
    minDps: options.minDps ?? 0,
    minManaRegen: options.minManaRegen ?? 0,
    maxCost: options.maxCost ?? null,
  };
  const errors: BuildValidationIssue[] = collectStructuralIssues(build, constraints, false);

  for (const slot of ITEM_SLOTS) {
    const item = build[slot];
    if (!item || item.level <= characterLevel) continue;
    errors.push({ code: 'level_requirement', slot, message: `${item.name} needs level ${item.level}; the character is level ${characterLevel}.` });
  }

  const classData = (options.classData ?? DEFAULT_CLASS_DATA)[constraints.characterClass];
  const derived = deriveBuildStats(build, aggregateBuild(build), { classData, characterLevel, maxSkillPoints: constraints.maxSkillPoints });
  errors.push(...collectThresholdIssues(derived, constraints));

  return {
    valid: errors.length === 0,
    errors,
    warnings: collectBuildWarnings(build),
    skillPoints: sumRequirements(build),
  };
}
