/**
 * Request Context Middleware
 *
 * Attaches a correlation ID, request ID and a correlated child logger to
 * every request, and echoes the IDs back as response headers.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '@village-gap/shared';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';
export const REQUEST_ID_HEADER = 'X-Request-ID';

/**
 * Per-request tracing context
 */
export interface RequestContext {
  correlationId: string;
  requestId: string;
  startTime: number;
  logger: Logger;
}

declare global {
  namespace Express {
    interface Request {
      context?: RequestContext;
    }
  }
}

function createContext(req: Request, logger: Logger): RequestContext {
  const correlationId = req.header(CORRELATION_ID_HEADER) || uuidv4();
  return {
    correlationId,
    requestId: uuidv4(),
    startTime: Date.now(),
    logger: logger.child(correlationId),
  };
}

/**
 * Middleware that adds the request context
 */
export function requestContext(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const context = createContext(req, logger);
    req.context = context;
    res.setHeader(CORRELATION_ID_HEADER, context.correlationId);
    res.setHeader(REQUEST_ID_HEADER, context.requestId);
    next();
  };
}

/**
 * Returns the request's context, creating one if the middleware did not run
 */
export function getRequestContext(req: Request, logger: Logger): RequestContext {
  if (!req.context) {
    req.context = createContext(req, logger);
  }
  return req.context;
}
