import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { generateBuilds } from '@/domain/autobuilder/generate';
import { computeSpellDps } from '@/domain/build/build-metrics';
import { aggregateBuild } from '@/domain/build/aggregate';
import { DEFAULT_CLASS_DATA } from '@/domain/class-data/class-data';
import { CHARACTER_CLASSES, CLASS_WEAPON_TYPE, SKILL_STATS, WEAPON_TYPES } from '@/domain/items/types';
import { makeBuild, makeItem, makeTestCatalog, rawItem, recordingLogger } from '@/tests/helpers';

const requirementsArb = fc.record({
  strReq: fc.integer({ min: 0, max: 120 }),
  dexReq: fc.integer({ min: 0, max: 120 }),
  intReq: fc.integer({ min: 0, max: 120 }),
  defReq: fc.integer({ min: 0, max: 120 }),
  agiReq: fc.integer({ min: 0, max: 120 }),
  hp: fc.integer({ min: 0, max: 3000 }),
  sdPct: fc.integer({ min: -20, max: 40 }),
  mr: fc.integer({ min: 0, max: 10 }),
});

const slotArb = (maxLength: number) => fc.array(requirementsArb, { minLength: 0, maxLength });

const catalogArb = fc.record({
  helmet: slotArb(3),
  chestplate: slotArb(3),
  leggings: slotArb(2),
  boots: slotArb(2),
  ring: slotArb(4),
  necklace: slotArb(2),
  weapons: fc.array(fc.record({ type: fc.constantFrom(...WEAPON_TYPES), stats: requirementsArb }), { minLength: 1, maxLength: 4 }),
});

type CatalogShape = typeof catalogArb extends fc.Arbitrary<infer T> ? T : never;

function toRawItems(shape: CatalogShape) {
  const items: Array<ReturnType<typeof rawItem>> = [];
  const armour = ['helmet', 'chestplate', 'leggings', 'boots', 'ring', 'necklace'] as const;
  for (const type of armour) {
    shape[type].forEach((stats, index) => items.push(rawItem({ name: `${type} ${index}`, type, ...stats })));
  }
  shape.weapons.forEach(({ type, stats }, index) =>
    items.push(rawItem({ name: `weapon ${index}`, type, nDam: '40-80', atkSpd: 'FAST', ...stats })),
  );
  return items;
}

const runArb = fc.record({
  shape: catalogArb,
  characterClass: fc.constantFrom(...CHARACTER_CLASSES),
  maxSkillPoints: fc.integer({ min: 60, max: 200 }),
  topN: fc.integer({ min: 1, max: 6 }),
});

describe('generated builds', () => {
  it('always satisfy the structural rules and come back best first', () => {
    fc.assert(
      fc.property(runArb, ({ shape, characterClass, maxSkillPoints, topN }) => {
        const catalog = makeTestCatalog(toRawItems(shape));
        const result = generateBuilds(
          catalog,
          { characterClass, maxSkillPoints, topN, maxChecks: 400 },
          { logger: recordingLogger().logger },
        );

        expect(result.builds.length).toBeLessThanOrEqual(topN);
        expect(result.checkedCombinations).toBeLessThanOrEqual(400);
        for (let i = 1; i < result.builds.length; i++) {
          expect(result.builds[i - 1].score).toBeGreaterThanOrEqual(result.builds[i].score);
        }
        for (const { build, derived } of result.builds) {
          for (const stat of SKILL_STATS) {
            expect(derived.skillPoints[stat]).toBeLessThanOrEqual(maxSkillPoints);
          }
          expect(derived.skillPointTotal).toBeLessThanOrEqual(maxSkillPoints);
          expect(Number(build.ring1 !== null) + Number(build.ring2 !== null)).not.toBe(1);
          expect(build.weapon?.weapon?.type).toBe(CLASS_WEAPON_TYPE[characterClass]);
        }
      }),
      { numRuns: 60 },
    );
  });

  it('are reproducible for the same catalog and config', () => {
    fc.assert(
      fc.property(runArb, ({ shape, characterClass, maxSkillPoints, topN }) => {
        const catalog = makeTestCatalog(toRawItems(shape));
        const config = { characterClass, maxSkillPoints, topN, maxChecks: 200 };
        const first = generateBuilds(catalog, config, { logger: recordingLogger().logger });
        const second = generateBuilds(catalog, config, { logger: recordingLogger().logger });
        expect(second.builds.map((entry) => entry.score)).toEqual(first.builds.map((entry) => entry.score));
        expect(second.stopReason).toBe(first.stopReason);
      }),
      { numRuns: 30 },
    );
  });
});

describe('computeSpellDps', () => {
  it('is zero without a weapon whatever the armour gives', () => {
    fc.assert(
      fc.property(requirementsArb, fc.constantFrom(...CHARACTER_CLASSES), (stats, characterClass) => {
        const build = makeBuild({ helmet: makeItem({ name: 'Any Hood', type: 'helmet', ...stats, sdRaw: 50 }) });
        expect(computeSpellDps(build.weapon, aggregateBuild(build), DEFAULT_CLASS_DATA[characterClass])).toBe(0);
      }),
    );
  });
});
