/**
 * Error Types
 *
 * Domain errors raised by the loader, the threshold factory and the
 * comparison engine. The API layer maps each to an HTTP status.
 */

import type { ZodError } from 'zod';

/**
 * Field-level validation detail
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

/**
 * Formats Zod validation errors into field-level error details
 */
export function formatValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * The tabular village source is missing or malformed. Fatal at load time.
 */
export class DataSourceError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DataSourceError';
  }
}

/**
 * A requested threshold value lies outside its allowed range
 */
export class ThresholdValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[]
  ) {
    super(message);
    this.name = 'ThresholdValidationError';
  }
}

/**
 * Environment configuration could not be parsed
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Degenerate comparison request, e.g. a village compared with itself
 */
export class ComparisonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ComparisonError';
  }
}

/**
 * No village with the requested identifier is loaded
 */
export class VillageNotFoundError extends Error {
  constructor(public readonly villageId: string) {
    super(`Village ${villageId} not found`);
    this.name = 'VillageNotFoundError';
  }
}
