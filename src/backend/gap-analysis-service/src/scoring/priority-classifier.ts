/**
 * Priority Classifier
 *
 * Maps a priority score onto fixed severity bands.
 *
 * @tested tests/property/priority-classifier.property.test.ts
 */

import { PriorityLevel, PriorityTier } from '@village-gap/shared';

/**
 * Lowest score of each band
 */
export const PRIORITY_BANDS = {
  high: 10,
  medium: 5,
} as const;

export const PRIORITY_LABELS: Record<PriorityTier, PriorityLevel> = {
  red: PriorityLevel.HIGH,
  orange: PriorityLevel.MEDIUM,
  green: PriorityLevel.LOW,
};

const TIER_SEVERITY: Record<PriorityTier, number> = {
  green: 0,
  orange: 1,
  red: 2,
};

/**
 * Classifies a non-negative score: >= 10 red, 5-9 orange, below 5 green
 */
export function classifyPriority(score: number): PriorityTier {
  if (score >= PRIORITY_BANDS.high) return PriorityTier.RED;
  if (score >= PRIORITY_BANDS.medium) return PriorityTier.ORANGE;
  return PriorityTier.GREEN;
}

/**
 * Numeric severity of a tier (green 0, orange 1, red 2)
 */
export function tierSeverity(tier: PriorityTier): number {
  return TIER_SEVERITY[tier];
}
