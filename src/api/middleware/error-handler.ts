/**
 * Error Handler
 *
 * Turns anything thrown by a route into a consistent JSON error response.
 * Tutoring failures keep their stable code and get the matching HTTP status;
 * request validation failures come through as {@link AppError}; anything else
 * becomes INTERNAL_ERROR.
 *
 * Error Response Format:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "HINT_EXHAUSTED",
 *     "message": "All hint tiers have been revealed"
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 * ```
 */

import type { ErrorHandler } from 'hono';
import { TutorError, toPublicError, type TutorErrorCode } from '@/core/errors';
import { isProduction } from '@/config';
import { error } from '../utils/response';

/**
 * Error codes raised by the HTTP layer itself, before the core is reached.
 */
export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status for each tutoring error code.
 *
 * CANCELLED uses 499 (client closed request); the client has usually gone
 * by the time it is written.
 */
export const TUTOR_ERROR_STATUS: Record<TutorErrorCode, number> = {
  INVALID_INPUT: 400,
  MALFORMED_SNAPSHOT: 400,
  NOT_FOUND: 404,
  HINT_EXHAUSTED: 409,
  SKIP_NOT_ALLOWED: 409,
  FLASHCARD_LIMIT_REACHED: 409,
  MODEL_RATE_LIMITED: 429,
  CANCELLED: 499,
  MODEL_MALFORMED_RESPONSE: 502,
  ANALYSIS_UNAVAILABLE: 503,
  MODEL_UNAVAILABLE: 503,
  STORE_UNAVAILABLE: 503,
  MODEL_TIMEOUT: 504,
};

/**
 * Error raised by the HTTP layer (bad JSON, schema violations).
 *
 * @example
 * ```typescript
 * throw new AppError('VALIDATION_ERROR', 'Invalid request body', 400, details);
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Creates the app-level error handler.
 */
export function errorHandler(): ErrorHandler {
  return (thrown, c) => {
    if (thrown instanceof AppError) {
      return error(thrown.code, thrown.message, thrown.statusCode, thrown.details);
    }

    if (thrown instanceof TutorError) {
      const status = TUTOR_ERROR_STATUS[thrown.code];
      if (status >= 500) {
        console.error(
          `[Error Handler] ${c.req.method} ${c.req.path} ${thrown.code}: ${thrown.message}`,
          thrown.context,
          thrown.cause ?? ''
        );
      }
      const { code, message } = toPublicError(thrown);
      return error(code, message, status);
    }

    console.error('[Error Handler]', thrown);

    const { code, message } = toPublicError(thrown);
    return error(
      code,
      message,
      500,
      isProduction() ? undefined : { stack: thrown.stack }
    );
  };
}
