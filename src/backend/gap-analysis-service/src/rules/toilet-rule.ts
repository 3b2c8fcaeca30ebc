/**
 * Toilets Rule
 *
 * Household toilet saturation. Toilet deficits are numerous but individually
 * low-weight: every started block of 100 missing toilets adds one point, up to
 * a maximum of five.
 */

import { GapCategory, type ThresholdSet } from '@village-gap/shared';

import { ceilRatio, type GapRule } from './gap-rule.js';

export const TOILET_SCORE_BLOCK = 100;
export const MAX_TOILET_CONTRIBUTION = 5;

/**
 * Calculates the number of household toilets required
 */
export function requiredToilets(households: number, thresholds: ThresholdSet): number {
  return ceilRatio(households * thresholds.toiletsPerHousehold);
}

/**
 * Score contribution of a toilet shortfall (saturates at 5)
 */
export function toiletContribution(shortfall: number): number {
  return Math.min(MAX_TOILET_CONTRIBUTION, Math.ceil(shortfall / TOILET_SCORE_BLOCK));
}

export const toiletRule: GapRule = {
  category: GapCategory.TOILETS,
  actual: (village) => village.toilets,
  required: (village, thresholds) => requiredToilets(village.households, thresholds),
  contribution: toiletContribution,
  suggestion: (shortfall, required) =>
    `Complete ${shortfall} household toilet(s) (Target: ${required})`,
};
