/**
 * API Response Helpers
 *
 * Build the standard `{ success, data }` / `{ success, error }` envelopes so
 * every route answers in the same shape.
 *
 * @example
 * ```typescript
 * router.get('/users/:userId', async (c) => {
 *   const user = await orchestrator.getUser(c.req.param('userId'));
 *   return success(c, user);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

/**
 * Creates a success response.
 *
 * @param statusCode - HTTP status code (default: 200)
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

/**
 * Creates an error response.
 *
 * Hono's status union stops short of unofficial codes such as 499, so the
 * response is built directly.
 */
export function error(
  code: string,
  message: string,
  statusCode: number = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return new Response(JSON.stringify(response), {
    status: statusCode,
    headers: { 'Content-Type': 'application/json' },
  });
}
