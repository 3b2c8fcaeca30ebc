/**
 * Water Points Rule
 *
 * One water point per started block of 50 households (scaled by the
 * threshold), with at least one for any village.
 */

import { GapCategory, type ThresholdSet } from '@village-gap/shared';

import { ceilRatio, type GapRule } from './gap-rule.js';

export const HOUSEHOLD_BLOCK = 50;

/**
 * Calculates the number of water points required
 */
export function requiredWaterPoints(households: number, thresholds: ThresholdSet): number {
  return Math.max(
    1,
    ceilRatio(households / HOUSEHOLD_BLOCK) * thresholds.waterPointsPer50Households
  );
}

export const waterPointRule: GapRule = {
  category: GapCategory.WATER_POINTS,
  actual: (village) => village.waterPoints,
  required: (village, thresholds) => requiredWaterPoints(village.households, thresholds),
  contribution: (shortfall) => shortfall,
  suggestion: (shortfall, required) => `${shortfall} more water point(s) (Target: ${required})`,
};
