/**
 * Tutoring Error Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { TutorError, toPublicError } from './errors';

describe('toPublicError', () => {
  it('keeps the message of a protocol or input error', () => {
    const error = new TutorError('INVALID_INPUT', 'Message must not be empty', { userId: 'user_1' });

    expect(toPublicError(error)).toEqual({ code: 'INVALID_INPUT', message: 'Message must not be empty' });
  });

  it('replaces the message of a collaborator failure', () => {
    const error = new TutorError(
      'MODEL_RATE_LIMITED',
      'Model request failed (hint): Anthropic API rate limit exceeded',
      { operation: 'handleMessage' },
      new Error('429')
    );

    expect(toPublicError(error)).toEqual({
      code: 'MODEL_RATE_LIMITED',
      message: 'The tutor is receiving too many requests. Please try again shortly.',
    });
  });

  it('replaces the message of a store failure', () => {
    const error = new TutorError('STORE_UNAVAILABLE', 'Session history could not be saved');

    expect(toPublicError(error)).toEqual({
      code: 'STORE_UNAVAILABLE',
      message: 'Session history is unavailable right now. Please try again.',
    });
  });

  it('hides anything that is not a tutoring error', () => {
    expect(toPublicError(new Error('SQLITE_BUSY: database is locked'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred. Please try again.',
    });
  });
});
