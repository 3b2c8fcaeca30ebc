/**
 * Property 7: Threshold Set Validation
 *
 * For any override within its allowed range and step, a threshold set SHALL
 * be built, frozen and otherwise equal to the base; any out-of-range or
 * off-step value SHALL be rejected with the offending field named.
 *
 * @file src/backend/shared/src/models/thresholds.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  BASE_THRESHOLDS,
  THRESHOLD_BOUNDS,
  THRESHOLD_KEYS,
  ThresholdValidationError,
  createThresholdSet,
  parseThresholdOverrides,
} from '../../src/backend/shared/src/index.js';

// Property test configuration
const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const thresholdKey = fc.constantFrom(...THRESHOLD_KEYS);

const inRangeOverride = thresholdKey.chain((key) => {
  const { min, max, step } = THRESHOLD_BOUNDS[key];
  const steps = Math.round((max - min) / step);
  return fc
    .integer({ min: 0, max: steps })
    .map((index) => ({ key, value: Number((min + index * step).toFixed(1)) }));
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('Property 7: Threshold Set Validation', () => {
  it('in-range overrides SHALL be accepted and leave other fields at base', () => {
    fc.assert(
      fc.property(inRangeOverride, ({ key, value }) => {
        const thresholds = createThresholdSet({ [key]: value });

        expect(thresholds[key]).toBe(value);
        for (const other of THRESHOLD_KEYS.filter((candidate) => candidate !== key)) {
          expect(thresholds[other]).toBe(BASE_THRESHOLDS[other]);
        }
      }),
      propertyConfig
    );
  });

  it('threshold sets SHALL be frozen', () => {
    fc.assert(
      fc.property(inRangeOverride, ({ key, value }) => {
        expect(Object.isFrozen(createThresholdSet({ [key]: value }))).toBe(true);
      }),
      propertyConfig
    );
  });

  it('out-of-range values SHALL be rejected naming the field', () => {
    fc.assert(
      fc.property(
        thresholdKey,
        fc.oneof(fc.integer({ min: -50, max: 0 }), fc.integer({ min: 25, max: 500 })),
        (key, value) => {
          const error = captureError(() => createThresholdSet({ [key]: value }));

          expect(error).toBeInstanceOf(ThresholdValidationError);
          if (error instanceof ThresholdValidationError) {
            expect(error.issues.map((issue) => issue.field)).toContain(key);
          }
        }
      ),
      propertyConfig
    );
  });

  describe('Examples', () => {
    it('base thresholds SHALL be the minimum standards', () => {
      expect(BASE_THRESHOLDS).toEqual({
        schoolsPer1000: 1,
        toiletsPerHousehold: 1.0,
        phcsMin: 1,
        waterPointsPer50Households: 1,
        electricityHoursMin: 24,
      });
      expect(Object.isFrozen(BASE_THRESHOLDS)).toBe(true);
    });

    it('an empty override SHALL yield the base values', () => {
      expect(createThresholdSet()).toEqual(BASE_THRESHOLDS);
      expect(createThresholdSet({ phcsMin: undefined })).toEqual(BASE_THRESHOLDS);
    });

    it('off-step values SHALL be rejected', () => {
      expect(() => createThresholdSet({ toiletsPerHousehold: 1.05 })).toThrow(
        ThresholdValidationError
      );
      expect(() => createThresholdSet({ schoolsPer1000: 1.5 })).toThrow(
        'Threshold values are outside their allowed ranges'
      );
    });

    it('toilet ratio 1.3 and electricity 9 SHALL be out of range', () => {
      const error = captureError(() =>
        createThresholdSet({ toiletsPerHousehold: 1.3, electricityHoursMin: 9 })
      );

      expect(error).toBeInstanceOf(ThresholdValidationError);
      if (error instanceof ThresholdValidationError) {
        expect(error.issues.map((issue) => issue.field)).toEqual([
          'toiletsPerHousehold',
          'electricityHoursMin',
        ]);
      }
    });

    it('query-string overrides SHALL be coerced to numbers', () => {
      expect(parseThresholdOverrides({ toiletsPerHousehold: '1.2', phcsMin: '2' })).toEqual({
        ...BASE_THRESHOLDS,
        toiletsPerHousehold: 1.2,
        phcsMin: 2,
      });
    });

    it('non-numeric query-string overrides SHALL be rejected', () => {
      expect(() => parseThresholdOverrides({ schoolsPer1000: 'many' })).toThrow(
        'Threshold parameters must be numeric'
      );
    });

    it('unrelated query parameters SHALL be ignored', () => {
      expect(parseThresholdOverrides({ limit: '3', format: 'json' })).toEqual(BASE_THRESHOLDS);
    });
  });
});
