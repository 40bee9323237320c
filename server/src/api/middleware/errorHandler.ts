/**
 * Error Handler Middleware
 *
 * Typed domain errors become JSON responses with their own status code;
 * anything else is logged and answered with a 500.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { isDomainError, logger, NODE_ENV } from '@davgate/shared';
import type { DomainError } from '@davgate/shared';

/**
 * Context keys that may be shown to clients outside development.
 */
const SAFE_CONTEXT_KEYS = new Set(['field', 'resource', 'expectedFormat']);

function sanitizeContext(context: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!context) return undefined;

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (SAFE_CONTEXT_KEYS.has(key)) {
      sanitized[key] = value;
    }
  }

  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
}

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code: string;
    context?: Record<string, unknown>;
  };
  timestamp: string;
}

function createErrorResponse(error: DomainError): ErrorResponse {
  const context = NODE_ENV === 'development' ? error.context : sanitizeContext(error.context);

  return {
    success: false,
    error: {
      message: error.message,
      code: error.type,
      ...(context && Object.keys(context).length > 0 && { context }),
    },
    timestamp: new Date().toISOString(),
  };
}

export const domainErrorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (!isDomainError(err) || res.headersSent) {
    next(err);
    return;
  }

  const logContext = {
    component: 'ErrorHandler',
    errorType: err.type,
    method: req.method,
    path: req.path,
  };

  if (err.statusCode >= 500) {
    logger.error(`Domain error: ${err.message}`, err, logContext);
  } else {
    logger.debug(`Domain error: ${err.message}`, logContext);
  }

  res.status(err.statusCode).json(createErrorResponse(err));
};

export const genericErrorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  logger.error('Unhandled request error', err, {
    component: 'ErrorHandler',
    method: req.method,
    path: req.path,
  });

  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(500).json({ success: false, error: 'Internal server error' });
};

/**
 * Wrap an async handler so a rejection reaches the error middleware.
 * Express 4 doesn't catch async errors on its own.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
