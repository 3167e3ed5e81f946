/**
 * Unit tests for configuration parsing and validation.
 */

import { describe, it, expect } from 'vitest';
import { parseConfig, validateConfig, ConfigValidationError } from '../../src/config';

function configError(fn: () => unknown): ConfigValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConfigValidationError');
}

describe('parseConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = parseConfig({});

    expect(config.server).toEqual({ port: 3001, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.database.path).toBe('debug-mentor.db');
    expect(config.anthropic.apiKey).toBeUndefined();
    expect(config.tutoring.confusion).toEqual({
      windowSize: 5,
      negativeWeight: 0.6,
      repetitionWeight: 0.4,
      mediumThreshold: 0.3,
      highThreshold: 0.6,
    });
    expect(config.tutoring.flashcards).toEqual({ retentionCeiling: 500, dedupWindowMs: null });
  });

  it('reads tutoring settings from the environment', () => {
    const config = parseConfig({
      PORT: '8080',
      CONFUSION_WINDOW_SIZE: '3',
      CONFUSION_HIGH_THRESHOLD: '0.75',
      FLASHCARD_RETENTION_CEILING: '50',
      FLASHCARD_DEDUP_WINDOW_MS: '86400000',
    });

    expect(config.server.port).toBe(8080);
    expect(config.tutoring.confusion.windowSize).toBe(3);
    expect(config.tutoring.confusion.highThreshold).toBe(0.75);
    expect(config.tutoring.flashcards).toEqual({ retentionCeiling: 50, dedupWindowMs: 86400000 });
  });

  it('rejects thresholds out of order', () => {
    const error = configError(() => parseConfig({ CONFUSION_MEDIUM_THRESHOLD: '0.7' }));

    expect(error.message).toBe(
      'Invalid configuration: tutoring.confusion: mediumThreshold must be below highThreshold'
    );
  });

  it('names an unknown NODE_ENV', () => {
    const error = configError(() => parseConfig({ NODE_ENV: 'staging' }));

    expect(error.invalidVars.map((v) => v.name)).toEqual(['server.nodeEnv']);
  });
});

describe('validateConfig', () => {
  it('accepts a development config without an API key', () => {
    expect(() => validateConfig(parseConfig({ NODE_ENV: 'development' }))).not.toThrow();
  });

  it('requires an API key in production', () => {
    const error = configError(() => validateConfig(parseConfig({ NODE_ENV: 'production' })));

    expect(error.missingVars).toEqual(['ANTHROPIC_API_KEY']);
  });

  it('refuses an in-memory database in production', () => {
    const error = configError(() =>
      validateConfig(
        parseConfig({ NODE_ENV: 'production', ANTHROPIC_API_KEY: 'test-secret', DATABASE_PATH: ':memory:' })
      )
    );

    expect(error.invalidVars.map((v) => v.name)).toEqual(['DATABASE_PATH']);
  });
});
