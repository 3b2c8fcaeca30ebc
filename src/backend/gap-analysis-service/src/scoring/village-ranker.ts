/**
 * Village Ranking
 *
 * Orders enriched villages by priority score. Equal scores keep their input
 * order.
 *
 * @tested tests/property/ranking-stability.property.test.ts
 */

import type { EnrichedVillage } from '@village-gap/shared';

/**
 * Default size of the top-priority list
 */
export const DEFAULT_TOP_N = 5;

/**
 * Sorts villages by score descending without reordering ties
 */
export function sortByPriority<T extends Pick<EnrichedVillage, 'priorityScore'>>(
  villages: readonly T[]
): T[] {
  return villages
    .map((village, index) => ({ village, index }))
    .sort((a, b) => b.village.priorityScore - a.village.priorityScore || a.index - b.index)
    .map(({ village }) => village);
}

/**
 * Returns the top-N priority villages
 *
 * @param villages - Enriched villages in input order
 * @param limit - Maximum number of villages to return (negative values yield none)
 */
export function rankTopPriority<T extends Pick<EnrichedVillage, 'priorityScore'>>(
  villages: readonly T[],
  limit: number = DEFAULT_TOP_N
): T[] {
  return sortByPriority(villages).slice(0, Math.max(0, limit));
}
