/**
 * API error mapping
 */

import type { ErrorRequestHandler } from 'express';
import type { Logger } from 'pino';
import { CounterError, CounterErrorCode } from '../types.js';

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base API error with HTTP status code
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', details);
    this.name = 'BadRequestError';
  }
}

// =============================================================================
// Middleware
// =============================================================================

const STATUS_BY_CODE: Partial<Record<CounterErrorCode, number>> = {
  [CounterErrorCode.STORAGE_UNAVAILABLE]: 503,
  [CounterErrorCode.NO_AVAILABLE_NODE]: 503,
};

/**
 * Maps thrown errors to `{ status: 'error', code, message }` responses.
 * Storage outages become 503; anything unrecognised is a logged 500.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  const log = logger.child({ component: 'ApiErrorHandler' });

  return (error: unknown, req, res, _next) => {
    if (error instanceof ApiError) {
      res.status(error.statusCode).json({
        status: 'error',
        code: error.errorCode,
        message: error.message,
        ...(error.details && { details: error.details }),
      });
      return;
    }

    if (error instanceof CounterError) {
      const statusCode = STATUS_BY_CODE[error.code] ?? 500;
      log.warn({ code: error.code, path: req.path, details: error.details }, error.message);
      res.status(statusCode).json({ status: 'error', code: error.code, message: error.message });
      return;
    }

    log.error({ error, path: req.path }, 'Unhandled API error');
    res.status(500).json({ status: 'error', code: 'INTERNAL_ERROR', message: 'Internal server error' });
  };
}
