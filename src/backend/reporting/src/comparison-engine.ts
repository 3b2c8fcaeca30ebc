/**
 * Comparison Engine
 *
 * Builds a side-by-side comparison of two enriched villages over their raw
 * counts and derived score, with a difference column wherever both sides
 * are numeric.
 *
 * @tested tests/integration/reporting.integration.test.ts
 */

import { ComparisonError, type EnrichedVillage } from '@village-gap/shared';

/**
 * Marker used in the difference column when either side is not numeric
 */
export const NOT_APPLICABLE = 'N/A';

/**
 * Metrics shown in a comparison, in display order
 */
export const COMPARISON_METRICS = [
  'population',
  'households',
  'schools',
  'toilets',
  'phcs',
  'waterPoints',
  'electricityHours',
  'gapsSummary',
  'priorityScore',
] as const satisfies ReadonlyArray<keyof EnrichedVillage>;

export type ComparisonMetric = (typeof COMPARISON_METRICS)[number];

export type ComparisonValue = EnrichedVillage[ComparisonMetric];

/**
 * One row of the comparison table
 */
export interface ComparisonRow {
  metric: ComparisonMetric;
  first: ComparisonValue;
  second: ComparisonValue;
  difference: number | typeof NOT_APPLICABLE;
}

/**
 * Comparison result between two villages
 */
export interface VillageComparison {
  first: { villageId: string; villageName: string };
  second: { villageId: string; villageName: string };
  differenceLabel: string;
  rows: ComparisonRow[];
}

function difference(first: ComparisonValue, second: ComparisonValue): number | typeof NOT_APPLICABLE {
  return typeof first === 'number' && typeof second === 'number' ? first - second : NOT_APPLICABLE;
}

/**
 * Compares two distinct villages
 *
 * @throws ComparisonError when both sides are the same village
 */
export function compareVillages(first: EnrichedVillage, second: EnrichedVillage): VillageComparison {
  if (first.villageId === second.villageId) {
    throw new ComparisonError('Please select two different villages for comparison.');
  }

  return {
    first: { villageId: first.villageId, villageName: first.villageName },
    second: { villageId: second.villageId, villageName: second.villageName },
    differenceLabel: `Difference (${first.villageName} - ${second.villageName})`,
    rows: COMPARISON_METRICS.map((metric) => ({
      metric,
      first: first[metric],
      second: second[metric],
      difference: difference(first[metric], second[metric]),
    })),
  };
}
