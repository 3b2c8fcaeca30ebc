/**
 * Gap Rules
 *
 * Exports the per-category rules and the evaluator that runs them.
 */

export type { GapRule } from './gap-rule.js';
export { ceilRatio } from './gap-rule.js';

export { schoolRule, requiredSchools, POPULATION_BLOCK } from './school-rule.js';
export {
  toiletRule,
  requiredToilets,
  toiletContribution,
  TOILET_SCORE_BLOCK,
  MAX_TOILET_CONTRIBUTION,
} from './toilet-rule.js';
export { phcRule, PHC_WEIGHT } from './phc-rule.js';
export { waterPointRule, requiredWaterPoints, HOUSEHOLD_BLOCK } from './water-point-rule.js';
export { electricityRule, ELECTRICITY_SCORE_BLOCK_HOURS } from './electricity-rule.js';

export * from './gap-evaluator.js';
