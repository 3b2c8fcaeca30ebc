/**
 * Village Analysis Service
 *
 * Applies the gap evaluator and priority classifier across a village
 * collection, runs what-if upgrade simulations, and derives the aggregate
 * views (tier counts, gap frequency, top-N ranking).
 *
 * Every village is evaluated independently; the output keeps input order.
 *
 * @tested tests/property/village-analysis.property.test.ts
 * @tested tests/property/simulation.property.test.ts
 */

import {
  GAP_CATEGORIES,
  PriorityTier,
  getLogger,
  type AnalysisSummary,
  type EnrichedVillage,
  type GapDistribution,
  type Logger,
  type SimulationResult,
  type ThresholdSet,
  type Upgrade,
  type VillageRecord,
} from '@village-gap/shared';

import { DEFAULT_GAP_RULES, evaluateGaps } from '../rules/gap-evaluator.js';
import type { GapRule } from '../rules/gap-rule.js';
import { classifyPriority } from '../scoring/priority-classifier.js';
import { DEFAULT_TOP_N, rankTopPriority } from '../scoring/village-ranker.js';
import { applyUpgrade, describeUpgrade } from '../simulation/upgrade-simulator.js';

/**
 * Placeholder shown when a village has no gaps
 */
export const NO_GAPS_SUMMARY = 'None';

const SUMMARY_SEPARATOR = ', ';

/**
 * Evaluates one village and attaches its gaps, score, tier and suggestions
 */
export function analyzeVillage(
  village: Readonly<VillageRecord>,
  thresholds: ThresholdSet,
  rules: readonly GapRule[] = DEFAULT_GAP_RULES
): EnrichedVillage {
  const evaluation = evaluateGaps(village, thresholds, rules);

  return {
    ...village,
    gaps: evaluation.gaps,
    priorityScore: evaluation.score,
    priorityTier: classifyPriority(evaluation.score),
    improvements: evaluation.improvements,
    gapsSummary:
      evaluation.gaps.length > 0 ? evaluation.gaps.join(SUMMARY_SEPARATOR) : NO_GAPS_SUMMARY,
    improvementsSummary: evaluation.improvements.join(SUMMARY_SEPARATOR),
  };
}

/**
 * Evaluates every village. Output order matches input order.
 */
export function analyzeAll(
  villages: readonly Readonly<VillageRecord>[],
  thresholds: ThresholdSet,
  rules: readonly GapRule[] = DEFAULT_GAP_RULES
): EnrichedVillage[] {
  return villages.map((village) => analyzeVillage(village, thresholds, rules));
}

/**
 * Re-scores a derived copy of one village with a single upgrade applied and
 * returns it alongside the current result. The input record is not modified.
 */
export function simulateUpgrade(
  village: Readonly<VillageRecord>,
  upgrade: Upgrade,
  thresholds: ThresholdSet,
  rules: readonly GapRule[] = DEFAULT_GAP_RULES
): SimulationResult {
  const original = analyzeVillage(village, thresholds, rules);
  const simulated = analyzeVillage(applyUpgrade(village, upgrade), thresholds, rules);

  return {
    upgrade: { ...upgrade },
    description: describeUpgrade(upgrade),
    original,
    simulated,
    scoreChange: simulated.priorityScore - original.priorityScore,
    tierChanged: simulated.priorityTier !== original.priorityTier,
  };
}

/**
 * Counts villages per priority tier
 */
export function summarize(villages: readonly EnrichedVillage[]): AnalysisSummary {
  const tierCounts: Record<PriorityTier, number> = {
    red: 0,
    orange: 0,
    green: 0,
  };

  for (const village of villages) {
    tierCounts[village.priorityTier] += 1;
  }

  return { totalVillages: villages.length, tierCounts };
}

/**
 * Counts how many villages exhibit each gap category. Categories that never
 * occur are omitted; keys are ordered by count descending, ties in
 * evaluation order.
 */
export function gapDistribution(villages: readonly EnrichedVillage[]): GapDistribution {
  const counts = new Map<string, number>();
  for (const village of villages) {
    for (const gap of village.gaps) {
      counts.set(gap, (counts.get(gap) ?? 0) + 1);
    }
  }

  const distribution: GapDistribution = {};
  const ordered = GAP_CATEGORIES.filter((category) => counts.has(category)).sort(
    (a, b) => (counts.get(b) ?? 0) - (counts.get(a) ?? 0)
  );
  for (const category of ordered) {
    distribution[category] = counts.get(category) ?? 0;
  }
  return distribution;
}

/**
 * Service options
 */
export interface VillageAnalysisServiceOptions {
  logger?: Logger;
  rules?: readonly GapRule[];
  topN?: number;
}

/**
 * Village Analysis Service
 *
 * Thin stateful wrapper over the pure functions above that logs each pass.
 */
export class VillageAnalysisService {
  private readonly logger: Logger;
  private readonly rules: readonly GapRule[];
  private readonly topN: number;

  constructor(options: VillageAnalysisServiceOptions = {}) {
    this.logger = options.logger ?? getLogger();
    this.rules = options.rules ?? DEFAULT_GAP_RULES;
    this.topN = options.topN ?? DEFAULT_TOP_N;
  }

  /**
   * Evaluates every village under the given thresholds
   */
  analyzeAll(villages: readonly Readonly<VillageRecord>[], thresholds: ThresholdSet): EnrichedVillage[] {
    const startTime = Date.now();
    const enriched = analyzeAll(villages, thresholds, this.rules);

    this.logger.logEvaluation({
      operation: 'analyzeAll',
      villageCount: enriched.length,
      thresholds,
      tierCounts: summarize(enriched).tierCounts,
      processingTimeMs: Date.now() - startTime,
    });

    return enriched;
  }

  /**
   * Evaluates a single village with the service's rules
   */
  analyzeOne(village: Readonly<VillageRecord>, thresholds: ThresholdSet): EnrichedVillage {
    const startTime = Date.now();
    const enriched = analyzeVillage(village, thresholds, this.rules);

    this.logger.logEvaluation({
      operation: 'analyzeOne',
      villageCount: 1,
      thresholds,
      tierCounts: summarize([enriched]).tierCounts,
      processingTimeMs: Date.now() - startTime,
    });

    return enriched;
  }

  /**
   * Runs a what-if upgrade for one village
   */
  simulate(
    village: Readonly<VillageRecord>,
    upgrade: Upgrade,
    thresholds: ThresholdSet
  ): SimulationResult {
    const result = simulateUpgrade(village, upgrade, thresholds, this.rules);

    this.logger.info('Upgrade simulated', {
      villageId: village.villageId,
      upgrade: result.description,
      originalScore: result.original.priorityScore,
      simulatedScore: result.simulated.priorityScore,
    });

    return result;
  }

  /**
   * Highest-priority villages, stable under score ties
   */
  topPriority(villages: readonly EnrichedVillage[], limit: number = this.topN): EnrichedVillage[] {
    return rankTopPriority(villages, limit);
  }

  summarize(villages: readonly EnrichedVillage[]): AnalysisSummary {
    return summarize(villages);
  }

  gapDistribution(villages: readonly EnrichedVillage[]): GapDistribution {
    return gapDistribution(villages);
  }
}
