/**
 * Gap Rule Contract
 *
 * Each infrastructure category is one rule object. The evaluator runs every
 * rule the same way: compute the requirement, compare it with the village's
 * actual count, and on a shortfall ask the rule for its score contribution
 * and suggestion text.
 */

import type { GapCategory, ThresholdSet, VillageRecord } from '@village-gap/shared';

export interface GapRule {
  readonly category: GapCategory;

  /** The village's current level for this category */
  actual(village: Readonly<VillageRecord>): number;

  /** Minimum acceptable level under the given thresholds */
  required(village: Readonly<VillageRecord>, thresholds: ThresholdSet): number;

  /** Score points for a positive shortfall */
  contribution(shortfall: number): number;

  /** Human-readable improvement suggestion */
  suggestion(shortfall: number, required: number): string;
}

const ROUNDING_PRECISION = 1e10;

/**
 * Rounds up after trimming floating-point noise, so that 100 × 1.1 requires
 * 110 rather than 111.
 */
export function ceilRatio(value: number): number {
  return Math.ceil(Math.round(value * ROUNDING_PRECISION) / ROUNDING_PRECISION);
}
