/**
 * Schools Rule
 *
 * One school per started block of 1000 residents (scaled by the threshold),
 * with at least one school for any village.
 */

import { GapCategory, type ThresholdSet } from '@village-gap/shared';

import { ceilRatio, type GapRule } from './gap-rule.js';

export const POPULATION_BLOCK = 1000;

/**
 * Calculates the number of schools a village of the given population needs
 */
export function requiredSchools(population: number, thresholds: ThresholdSet): number {
  return Math.max(1, ceilRatio(population / POPULATION_BLOCK) * thresholds.schoolsPer1000);
}

export const schoolRule: GapRule = {
  category: GapCategory.SCHOOLS,
  actual: (village) => village.schools,
  required: (village, thresholds) => requiredSchools(village.population, thresholds),
  contribution: (shortfall) => shortfall,
  suggestion: (shortfall, required) => `${shortfall} more school(s) (Target: ${required})`,
};
