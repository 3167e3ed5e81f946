/**
 * Tutoring Error Taxonomy
 *
 * Every failure the tutoring core reports carries a stable code and a
 * human-readable message. Context about where the failure happened
 * (operation, user, session) and the underlying cause stay on the error
 * object for logs; only `{ code, message }` crosses the exposed boundary
 * (see {@link toPublicError}). Codes raised for a collaborator failure
 * cross it with a fixed message, since their own message may carry the
 * collaborator's text.
 *
 * Protocol violations (hint ladder, explicit skip) are returned as
 * {@link Result} values rather than thrown.
 */

/**
 * Stable error codes reported by the tutoring core.
 */
export const TutorErrorCodes = {
  /** Malformed or empty message/code, rejected before any state change */
  INVALID_INPUT: 'INVALID_INPUT',
  /** Sentiment scorer or code analyzer failed */
  ANALYSIS_UNAVAILABLE: 'ANALYSIS_UNAVAILABLE',
  /** All three hint tiers are already revealed */
  HINT_EXHAUSTED: 'HINT_EXHAUSTED',
  /** A jump past the next tier was requested without the explicit-skip flag */
  SKIP_NOT_ALLOWED: 'SKIP_NOT_ALLOWED',
  /** A restore snapshot failed validation */
  MALFORMED_SNAPSHOT: 'MALFORMED_SNAPSHOT',
  /** The per-user flashcard ceiling was exceeded (warning only) */
  FLASHCARD_LIMIT_REACHED: 'FLASHCARD_LIMIT_REACHED',
  /** The model gateway timed out */
  MODEL_TIMEOUT: 'MODEL_TIMEOUT',
  /** The model gateway rejected the request for rate limiting */
  MODEL_RATE_LIMITED: 'MODEL_RATE_LIMITED',
  /** The model gateway answered with something unusable */
  MODEL_MALFORMED_RESPONSE: 'MODEL_MALFORMED_RESPONSE',
  /** The model gateway failed for any other reason */
  MODEL_UNAVAILABLE: 'MODEL_UNAVAILABLE',
  /** The session store failed to persist or load */
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  /** Unknown debugging session or flashcard */
  NOT_FOUND: 'NOT_FOUND',
  /** The caller cancelled before the operation committed */
  CANCELLED: 'CANCELLED',
} as const;

export type TutorErrorCode = (typeof TutorErrorCodes)[keyof typeof TutorErrorCodes];

/**
 * Where a failure happened. Kept for logs, never returned to callers.
 */
export interface TutorErrorContext {
  operation?: string;
  userId?: string;
  sessionId?: string;
}

/**
 * Error raised (or returned inside a {@link Result}) by the tutoring core.
 *
 * @example
 * ```typescript
 * throw new TutorError('INVALID_INPUT', 'Message must not be empty', {
 *   operation: 'handleMessage',
 *   userId,
 * });
 * ```
 */
export class TutorError extends Error {
  public readonly code: TutorErrorCode;
  public readonly context: TutorErrorContext;

  constructor(
    code: TutorErrorCode,
    message: string,
    context: TutorErrorContext = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TutorError';
    this.code = code;
    this.context = context;
  }

  /**
   * Returns a copy of this error with additional context merged in.
   * Existing context keys win, so the innermost location is preserved.
   */
  withContext(context: TutorErrorContext): TutorError {
    return new TutorError(this.code, this.message, { ...context, ...this.context }, this.cause);
  }
}

/**
 * The only error shape returned across the exposed boundary.
 */
export interface PublicError {
  code: TutorErrorCode | 'INTERNAL_ERROR';
  message: string;
}

/**
 * Public messages for codes raised on a collaborator failure.
 */
export const PUBLIC_MESSAGES: Partial<Record<TutorErrorCode, string>> = {
  ANALYSIS_UNAVAILABLE: 'The message could not be analyzed. Please try again.',
  MODEL_TIMEOUT: 'The tutor took too long to respond. Please try again.',
  MODEL_RATE_LIMITED: 'The tutor is receiving too many requests. Please try again shortly.',
  MODEL_MALFORMED_RESPONSE: 'The tutor returned an unusable response. Please try again.',
  MODEL_UNAVAILABLE: 'The tutor is unavailable right now. Please try again.',
  STORE_UNAVAILABLE: 'Session history is unavailable right now. Please try again.',
};

/**
 * Strips an error down to its stable code and message.
 * Anything that is not a TutorError becomes a generic internal error.
 */
export function toPublicError(error: unknown): PublicError {
  if (error instanceof TutorError) {
    return { code: error.code, message: PUBLIC_MESSAGES[error.code] ?? error.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred. Please try again.',
  };
}

/**
 * Outcome of an operation whose failures are part of its protocol.
 */
export type Result<T, E = TutorError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function invalidInput(message: string, context: TutorErrorContext = {}): TutorError {
  return new TutorError(TutorErrorCodes.INVALID_INPUT, message, context);
}
