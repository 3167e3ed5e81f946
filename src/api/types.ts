/**
 * API Type Definitions
 *
 * Shared response envelopes and zod request schemas for the HTTP API.
 *
 * All responses use one of two shapes:
 * - Success: { success: true, data: T }
 * - Error:   { success: false, error: { code, message, details? } }
 */

import { z } from 'zod';

// ============================================================================
// Success Response Types
// ============================================================================

/**
 * Standard success response wrapper.
 *
 * @example
 * ```json
 * { "success": true, "data": { "mode": "debugging" } }
 * ```
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

// ============================================================================
// Error Response Types
// ============================================================================

export interface ApiError {
  /** Machine-readable error code (e.g., 'HINT_EXHAUSTED') */
  code: string;

  /** Human-readable error message */
  message: string;

  /** Only validation failures carry details */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

export interface ValidationErrorDetail {
  /** Dot-separated path to the field (e.g., 'code') */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

/**
 * POST /api/users/:userId/messages
 *
 * Emptiness of the message and code is checked by the orchestrator so the
 * same rule applies to every entry point.
 */
export const messageRequestSchema = z.object({
  message: z.string(),
  code: z.string().nullable().optional(),
  language: z.string().min(1).max(50).nullable().optional(),
  sessionId: z.string().min(1).optional(),
});

export type MessageRequest = z.infer<typeof messageRequestSchema>;

/** PUT /api/users/:userId/mode */
export const modeRequestSchema = z.object({
  mode: z.enum(['learning', 'debugging']),
});

/** PUT /api/users/:userId/preferences */
export const preferencesRequestSchema = z.object({
  learningStyle: z.enum(['ELI5', 'Visual', 'Standard']),
});

/** POST /api/hints/:sessionId/jump */
export const hintJumpRequestSchema = z.object({
  level: z.number().int(),
  allowSkip: z.boolean().default(false),
});

/** POST /api/users/:userId/flashcards/:flashcardId/review */
export const reviewRequestSchema = z.object({
  rating: z.enum(['again', 'hard', 'good', 'easy']),
});

/**
 * GET /api/users/:userId/flashcards
 *
 * Query parameters arrive as strings.
 */
export const flashcardQuerySchema = z.object({
  type: z.enum(['syntax', 'logic', 'runtime']).optional(),
  due: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
  unreviewed: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
  limit: z.coerce.number().int().positive().optional(),
});
