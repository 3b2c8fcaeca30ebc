/**
 * Error Handling Middleware
 *
 * Maps domain and validation errors onto the standard error response:
 *
 * - ZodError, ThresholdValidationError → 400 ValidationError
 * - malformed JSON bodies → 400 BadRequest
 * - VillageNotFoundError → 404 NotFound
 * - ComparisonError → 422 InvalidComparison
 * - anything else → 500 InternalError (logged)
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import {
  ComparisonError,
  ThresholdValidationError,
  VillageNotFoundError,
  formatValidationIssues,
  type Logger,
  type ValidationIssue,
} from '@village-gap/shared';

import { getRequestContext } from './request-context.js';

/**
 * API Error response format
 */
export interface ApiErrorResponse {
  error: string;
  message: string;
  correlationId?: string;
  details?: ValidationIssue[];
}

/**
 * Creates a standardized error response
 */
export function createErrorResponse(
  error: string,
  message: string,
  correlationId?: string,
  details?: ValidationIssue[]
): ApiErrorResponse {
  return {
    error,
    message,
    correlationId,
    details,
  };
}

/**
 * Errors raised by express body parsing carry a 4xx status
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

/**
 * Global error handler
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const context = getRequestContext(req, logger);
    const { correlationId } = context;

    if (err instanceof ZodError) {
      res
        .status(400)
        .json(
          createErrorResponse(
            'ValidationError',
            'Request validation failed',
            correlationId,
            formatValidationIssues(err)
          )
        );
      return;
    }

    if (err instanceof ThresholdValidationError) {
      res
        .status(400)
        .json(createErrorResponse('ValidationError', err.message, correlationId, err.issues));
      return;
    }

    if (err instanceof VillageNotFoundError) {
      res.status(404).json(createErrorResponse('NotFound', err.message, correlationId));
      return;
    }

    if (err instanceof ComparisonError) {
      res.status(422).json(createErrorResponse('InvalidComparison', err.message, correlationId));
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined) {
      res
        .status(clientStatus)
        .json(createErrorResponse('BadRequest', 'Request could not be parsed', correlationId));
      return;
    }

    context.logger.error(
      'Unhandled error',
      err instanceof Error ? err : new Error(String(err)),
      { path: req.path, processingTimeMs: Date.now() - context.startTime }
    );
    res
      .status(500)
      .json(createErrorResponse('InternalError', 'An unexpected error occurred', correlationId));
  };
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(logger: Logger): RequestHandler {
  return (req: Request, res: Response): void => {
    res
      .status(404)
      .json(
        createErrorResponse(
          'NotFound',
          'The requested resource was not found',
          getRequestContext(req, logger).correlationId
        )
      );
  };
}
