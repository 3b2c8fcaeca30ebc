/**
 * PHC Rule
 *
 * Primary health centres / sub-centres against a fixed minimum. Health
 * facility gaps carry triple weight.
 */

import { GapCategory } from '@village-gap/shared';

import type { GapRule } from './gap-rule.js';

export const PHC_WEIGHT = 3;

export const phcRule: GapRule = {
  category: GapCategory.PHCS,
  actual: (village) => village.phcs,
  required: (_village, thresholds) => thresholds.phcsMin,
  contribution: (shortfall) => shortfall * PHC_WEIGHT,
  suggestion: (shortfall, required) => `${shortfall} more PHC/Sub-centre(s) (Target: ${required})`,
};
