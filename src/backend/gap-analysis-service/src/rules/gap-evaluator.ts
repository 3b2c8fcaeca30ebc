/**
 * Gap Evaluator
 *
 * Runs the ordered rule list against one village and folds the findings into
 * a gap list, a priority score and improvement suggestions.
 *
 * @tested tests/property/gap-evaluator.property.test.ts
 */

import type {
  GapEvaluation,
  GapFinding,
  ThresholdSet,
  VillageRecord,
} from '@village-gap/shared';

import type { GapRule } from './gap-rule.js';
import { schoolRule } from './school-rule.js';
import { toiletRule } from './toilet-rule.js';
import { phcRule } from './phc-rule.js';
import { waterPointRule } from './water-point-rule.js';
import { electricityRule } from './electricity-rule.js';

/**
 * Rules in evaluation order. The order determines the order of gaps and
 * improvements; the score is a plain sum.
 */
export const DEFAULT_GAP_RULES: readonly GapRule[] = Object.freeze([
  schoolRule,
  toiletRule,
  phcRule,
  waterPointRule,
  electricityRule,
]);

/**
 * Evaluates a single rule. Returns null when the requirement is met.
 */
export function evaluateRule(
  rule: GapRule,
  village: Readonly<VillageRecord>,
  thresholds: ThresholdSet
): GapFinding | null {
  const required = rule.required(village, thresholds);
  const actual = rule.actual(village);

  if (actual >= required) {
    return null;
  }

  const shortfall = required - actual;
  return {
    category: rule.category,
    required,
    actual,
    shortfall,
    suggestion: rule.suggestion(shortfall, required),
    contribution: rule.contribution(shortfall),
  };
}

/**
 * Gap Evaluator
 *
 * Deterministic and side-effect free. A village meeting every requirement
 * yields empty gaps and improvements and a score of 0.
 *
 * @param village - The village record to evaluate
 * @param thresholds - Threshold set in force for this pass (assumed within bounds)
 * @param rules - Optional rule list (defaults to the five standard categories)
 */
export function evaluateGaps(
  village: Readonly<VillageRecord>,
  thresholds: ThresholdSet,
  rules: readonly GapRule[] = DEFAULT_GAP_RULES
): GapEvaluation {
  const findings: GapFinding[] = [];

  for (const rule of rules) {
    const finding = evaluateRule(rule, village, thresholds);
    if (finding) {
      findings.push(finding);
    }
  }

  return {
    gaps: findings.map((finding) => finding.category),
    score: findings.reduce((sum, finding) => sum + finding.contribution, 0),
    improvements: findings.map((finding) => finding.suggestion),
    findings,
  };
}
