/**
 * Property 3: What-if Simulation Isolation
 *
 * For any village and upgrade, simulation SHALL re-score a derived copy with
 * exactly one field adjusted, SHALL never modify the source record, and an
 * upgrade SHALL never raise the priority score.
 *
 * @file src/backend/gap-analysis-service/src/simulation/upgrade-simulator.ts
 * @file src/backend/gap-analysis-service/src/analysis/village-analysis-service.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  UPGRADE_FIELDS,
  analyzeAll,
  applyUpgrade,
  describeUpgrade,
  simulateUpgrade,
  upgradedValue,
} from '../../src/backend/gap-analysis-service/src/index.js';
import {
  BASE_THRESHOLDS,
  UpgradeKind,
  type Upgrade,
  type VillageRecord,
} from '../../src/backend/shared/src/index.js';

// Property test configuration
const propertyConfig = {
  numRuns: 200,
  verbose: false,
};

const createVillage = (overrides: Partial<VillageRecord> = {}): VillageRecord => ({
  villageId: 'V-SIM',
  villageName: 'Simulated',
  population: 1000,
  households: 100,
  schools: 0,
  toilets: 0,
  phcs: 0,
  waterPoints: 0,
  electricityHours: 0,
  ...overrides,
});

const validVillage: fc.Arbitrary<VillageRecord> = fc.record({
  villageId: fc.string({ minLength: 1, maxLength: 10 }),
  villageName: fc.string({ maxLength: 30 }),
  population: fc.integer({ min: 0, max: 20000 }),
  households: fc.integer({ min: 0, max: 4000 }),
  schools: fc.integer({ min: 0, max: 30 }),
  toilets: fc.integer({ min: 0, max: 5000 }),
  phcs: fc.integer({ min: 0, max: 4 }),
  waterPoints: fc.integer({ min: 0, max: 250 }),
  electricityHours: fc.integer({ min: 0, max: 24 }),
});

const validUpgrade: fc.Arbitrary<Upgrade> = fc.record({
  kind: fc.constantFrom(...Object.values(UpgradeKind)),
  amount: fc.integer({ min: 1, max: 5 }),
});

describe('Property 3: What-if Simulation Isolation', () => {
  describe('Source isolation', () => {
    it('simulation SHALL NOT modify the source village', () => {
      fc.assert(
        fc.property(validVillage, validUpgrade, (village, upgrade) => {
          const source = Object.freeze({ ...village });

          const result = simulateUpgrade(source, upgrade, BASE_THRESHOLDS);

          expect(source).toEqual(village);
          expect(result.original.priorityScore).toBe(
            simulateUpgrade(village, upgrade, BASE_THRESHOLDS).original.priorityScore
          );
        }),
        propertyConfig
      );
    });

    it('an upgrade SHALL change only the field of its kind', () => {
      fc.assert(
        fc.property(validVillage, validUpgrade, (village, upgrade) => {
          const upgraded = applyUpgrade(village, upgrade);
          const field = UPGRADE_FIELDS[upgrade.kind];

          expect({ ...upgraded, [field]: village[field] }).toEqual(village);
          expect(upgraded[field]).toBe(upgradedValue(village, upgrade));
        }),
        propertyConfig
      );
    });

    it('re-analysing the collection after a simulation SHALL reproduce the original scores', () => {
      fc.assert(
        fc.property(fc.array(validVillage, { minLength: 1, maxLength: 10 }), validUpgrade, (villages, upgrade) => {
          const before = analyzeAll(villages, BASE_THRESHOLDS).map((village) => village.priorityScore);

          simulateUpgrade(villages[0], upgrade, BASE_THRESHOLDS);

          expect(analyzeAll(villages, BASE_THRESHOLDS).map((village) => village.priorityScore)).toEqual(before);
        }),
        propertyConfig
      );
    });

    it('a toilet upgrade of k blocks SHALL add exactly 100k toilets', () => {
      fc.assert(
        fc.property(validVillage, fc.integer({ min: 1, max: 5 }), (village, amount) => {
          expect(applyUpgrade(village, { kind: 'toilet', amount }).toilets).toBe(village.toilets + 100 * amount);
        }),
        propertyConfig
      );
    });

    it('electricity hours SHALL never exceed 24 after an upgrade', () => {
      fc.assert(
        fc.property(validVillage, fc.integer({ min: 1, max: 5 }), (village, amount) => {
          const upgraded = applyUpgrade(village, { kind: 'electricityHours', amount });

          expect(upgraded.electricityHours).toBeLessThanOrEqual(24);
          expect(upgraded.electricityHours).toBeGreaterThanOrEqual(village.electricityHours);
        }),
        propertyConfig
      );
    });
  });

  describe('Score outcome', () => {
    it('an upgrade SHALL never raise the priority score', () => {
      fc.assert(
        fc.property(validVillage, validUpgrade, (village, upgrade) => {
          const result = simulateUpgrade(village, upgrade, BASE_THRESHOLDS);

          expect(result.scoreChange).toBeLessThanOrEqual(0);
          expect(result.scoreChange).toBe(
            result.simulated.priorityScore - result.original.priorityScore
          );
          expect(result.tierChanged).toBe(
            result.simulated.priorityTier !== result.original.priorityTier
          );
        }),
        propertyConfig
      );
    });
  });

  describe('Examples', () => {
    it('one toilet block SHALL close a 100 toilet gap', () => {
      const result = simulateUpgrade(createVillage(), { kind: 'toilet', amount: 1 }, BASE_THRESHOLDS);

      expect(result.description).toBe('+1 Toilet (100 HH)');
      expect(result.original.priorityScore).toBe(13);
      expect(result.simulated.toilets).toBe(100);
      expect(result.simulated.gaps).toEqual(['Schools', 'PHCs', 'Water Points', 'Electricity']);
      expect(result.simulated.priorityScore).toBe(12);
      expect(result.scoreChange).toBe(-1);
      expect(result.tierChanged).toBe(false);
    });

    it('adding a PHC SHALL move a red village to orange', () => {
      const village = createVillage({ toilets: 100, waterPoints: 2 });

      const result = simulateUpgrade(village, { kind: 'phc', amount: 1 }, BASE_THRESHOLDS);

      expect(result.original.priorityScore).toBe(10);
      expect(result.original.priorityTier).toBe('red');
      expect(result.simulated.priorityScore).toBe(7);
      expect(result.simulated.priorityTier).toBe('orange');
      expect(result.scoreChange).toBe(-3);
      expect(result.tierChanged).toBe(true);
    });

    it('electricity upgrades SHALL be capped at 24 hours', () => {
      const village = createVillage({ electricityHours: 22 });

      const upgraded = applyUpgrade(village, { kind: 'electricityHours', amount: 5 });

      expect(upgraded.electricityHours).toBe(24);
      expect(village.electricityHours).toBe(22);
    });

    it('a partial electricity upgrade SHALL reduce the electricity points', () => {
      const result = simulateUpgrade(
        createVillage(),
        { kind: 'electricityHours', amount: 5 },
        BASE_THRESHOLDS
      );

      expect(result.simulated.electricityHours).toBe(5);
      expect(result.simulated.priorityScore).toBe(12);
      expect(result.simulated.improvements[4]).toBe('Need 24 hrs electricity supply');
    });

    const descriptions: Array<[Upgrade, string]> = [
      [{ kind: 'school', amount: 2 }, '+2 School'],
      [{ kind: 'toilet', amount: 3 }, '+3 Toilet (100 HH)'],
      [{ kind: 'phc', amount: 1 }, '+1 PHC'],
      [{ kind: 'waterPoint', amount: 4 }, '+4 Water Point'],
      [{ kind: 'electricityHours', amount: 5 }, '+5 Electricity Hours'],
    ];

    it.each(descriptions)('describes %o as %s', (upgrade, description) => {
      expect(describeUpgrade(upgrade)).toBe(description);
    });
  });
});
