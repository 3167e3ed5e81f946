/**
 * Request Validation Helpers
 *
 * Parse request bodies and query strings against zod schemas. On failure an
 * {@link AppError} is thrown and the error handler answers with 400 and the
 * per-field details.
 *
 * @example
 * ```typescript
 * router.put('/:userId/mode', async (c) => {
 *   const { mode } = await parseBody(c, modeRequestSchema);
 *   // mode is 'learning' | 'debugging'
 * });
 * ```
 */

import type { Context } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { AppError, ErrorCodes } from './error-handler';

function toDetails(zodError: z.ZodError): ValidationErrorDetail[] {
  return zodError.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Reads the JSON body and validates it.
 *
 * @throws AppError INVALID_JSON for an unparseable body, VALIDATION_ERROR for a schema mismatch
 */
export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (cause) {
    throw new AppError(ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 400, {
      reason: cause instanceof Error ? cause.message : String(cause),
    });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new AppError(
      ErrorCodes.VALIDATION_ERROR,
      'Invalid request body',
      400,
      toDetails(result.error)
    );
  }
  return result.data;
}

/**
 * Validates the query string.
 *
 * @throws AppError VALIDATION_ERROR for a schema mismatch
 */
export function parseQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.infer<T> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new AppError(
      ErrorCodes.VALIDATION_ERROR,
      'Invalid query parameters',
      400,
      toDetails(result.error)
    );
  }
  return result.data;
}
