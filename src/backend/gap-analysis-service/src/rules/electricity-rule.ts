/**
 * Electricity Rule
 *
 * Daily supply hours against a fixed minimum. Each started 4-hour deficit
 * adds one point.
 */

import { GapCategory } from '@village-gap/shared';

import type { GapRule } from './gap-rule.js';

export const ELECTRICITY_SCORE_BLOCK_HOURS = 4;

export const electricityRule: GapRule = {
  category: GapCategory.ELECTRICITY,
  actual: (village) => village.electricityHours,
  required: (_village, thresholds) => thresholds.electricityHoursMin,
  contribution: (shortfall) => Math.ceil(shortfall / ELECTRICITY_SCORE_BLOCK_HOURS),
  // The shortfall in hours is not part of this text; it states the target only.
  suggestion: (_shortfall, required) => `Need ${required} hrs electricity supply`,
};
