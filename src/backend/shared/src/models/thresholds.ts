/**
 * Threshold Set Models
 *
 * Minimum-service standards used to judge whether a village's infrastructure
 * is sufficient. A threshold set is frozen once built; a new evaluation pass
 * builds a new one instead of mutating a shared instance.
 *
 * @tested tests/property/threshold-validation.property.test.ts
 */

import { z } from 'zod';

import { ThresholdValidationError, formatValidationIssues } from '../errors/errors.js';

/**
 * Allowed range and step for each adjustable threshold
 */
export const THRESHOLD_BOUNDS = {
  schoolsPer1000: { min: 1, max: 3, step: 1 },
  toiletsPerHousehold: { min: 1.0, max: 1.2, step: 0.1 },
  phcsMin: { min: 1, max: 3, step: 1 },
  waterPointsPer50Households: { min: 1, max: 3, step: 1 },
  electricityHoursMin: { min: 10, max: 24, step: 1 },
} as const;

export const THRESHOLD_KEYS = [
  'schoolsPer1000',
  'toiletsPerHousehold',
  'phcsMin',
  'waterPointsPer50Households',
  'electricityHoursMin',
] as const;

const STEP_TOLERANCE = 1e-9;

function isOnStep(value: number, min: number, step: number): boolean {
  const steps = (value - min) / step;
  return Math.abs(steps - Math.round(steps)) < STEP_TOLERANCE;
}

function boundedField(name: keyof typeof THRESHOLD_BOUNDS) {
  const { min, max, step } = THRESHOLD_BOUNDS[name];
  return z
    .number()
    .min(min)
    .max(max)
    .refine((value) => isOnStep(value, min, step), {
      message: `Must be a multiple of ${step} between ${min} and ${max}`,
    });
}

/**
 * Threshold set schema
 */
export const ThresholdSetSchema = z.object({
  /** Schools required per started block of 1000 residents */
  schoolsPer1000: boundedField('schoolsPer1000'),
  /** Toilets required per household (1.0 = full saturation) */
  toiletsPerHousehold: boundedField('toiletsPerHousehold'),
  /** Fixed minimum number of PHCs / sub-centres */
  phcsMin: boundedField('phcsMin'),
  /** Water points required per started block of 50 households */
  waterPointsPer50Households: boundedField('waterPointsPer50Households'),
  /** Minimum daily hours of electricity supply */
  electricityHoursMin: boundedField('electricityHoursMin'),
});

export type ThresholdSet = Readonly<z.infer<typeof ThresholdSetSchema>>;

/**
 * Threshold overrides as they arrive from a query string
 */
export const ThresholdOverridesSchema = z.object({
  schoolsPer1000: z.coerce.number().optional(),
  toiletsPerHousehold: z.coerce.number().optional(),
  phcsMin: z.coerce.number().optional(),
  waterPointsPer50Households: z.coerce.number().optional(),
  electricityHoursMin: z.coerce.number().optional(),
});

export type ThresholdOverrides = z.infer<typeof ThresholdOverridesSchema>;

/**
 * Base minimum standards
 */
export const BASE_THRESHOLDS: ThresholdSet = Object.freeze({
  schoolsPer1000: 1,
  toiletsPerHousehold: 1.0,
  phcsMin: 1,
  waterPointsPer50Households: 1,
  electricityHoursMin: 24,
});

function definedOverrides(overrides: ThresholdOverrides): Partial<ThresholdSet> {
  const result: { -readonly [K in keyof ThresholdSet]?: number } = {};
  for (const key of THRESHOLD_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Builds a frozen threshold set from a base and a set of overrides.
 * Undefined overrides keep the base value.
 *
 * @throws ThresholdValidationError when any resulting value is out of bounds
 */
export function createThresholdSet(
  overrides: ThresholdOverrides = {},
  base: ThresholdSet = BASE_THRESHOLDS
): ThresholdSet {
  const result = ThresholdSetSchema.safeParse({ ...base, ...definedOverrides(overrides) });

  if (!result.success) {
    throw new ThresholdValidationError(
      'Threshold values are outside their allowed ranges',
      formatValidationIssues(result.error)
    );
  }

  return Object.freeze(result.data);
}

/**
 * Parses raw (string-valued) overrides, e.g. from a request query, into a
 * threshold set.
 */
export function parseThresholdOverrides(raw: unknown): ThresholdSet {
  const parsed = ThresholdOverridesSchema.safeParse(raw);

  if (!parsed.success) {
    throw new ThresholdValidationError(
      'Threshold parameters must be numeric',
      formatValidationIssues(parsed.error)
    );
  }

  return createThresholdSet(parsed.data);
}
