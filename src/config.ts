/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration loaded from environment variables once
 * at module load. Core modules never import this; the composition root maps
 * it onto their `DEFAULT_*` constants.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.tutoring.confusion.highThreshold);
 *
 *   // Production-only requirements (throws if unmet)
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// ============================================================================
// Configuration Schema
// ============================================================================

const weight = z.number().min(0).max(1);

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  database: z.object({
    /** SQLite file path, or ':memory:' */
    path: z.string().min(1).default('debug-mentor.db'),
  }),

  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(1024),
    timeoutMs: z.number().int().positive().default(30000),
  }),

  tutoring: z.object({
    confusion: z
      .object({
        windowSize: z.number().int().positive().default(5),
        negativeWeight: weight.default(0.6),
        repetitionWeight: weight.default(0.4),
        mediumThreshold: weight.default(0.3),
        highThreshold: weight.default(0.6),
      })
      .refine((c) => c.mediumThreshold < c.highThreshold, {
        message: 'mediumThreshold must be below highThreshold',
      }),
    flashcards: z.object({
      retentionCeiling: z.number().int().positive().default(500),
      /** Unset means duplicates are checked against the whole history */
      dedupWindowMs: z.number().int().positive().nullable().default(null),
    }),
  }),
});

export type Config = z.infer<typeof configSchema>;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Builds the raw (unvalidated) configuration from an environment.
 * Unset variables are left undefined so the schema defaults apply.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): unknown {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      maxTokens: parseIntOrUndefined(env.ANTHROPIC_MAX_TOKENS),
      timeoutMs: parseIntOrUndefined(env.ANTHROPIC_TIMEOUT_MS),
    },
    tutoring: {
      confusion: {
        windowSize: parseIntOrUndefined(env.CONFUSION_WINDOW_SIZE),
        negativeWeight: parseFloatOrUndefined(env.CONFUSION_NEGATIVE_WEIGHT),
        repetitionWeight: parseFloatOrUndefined(env.CONFUSION_REPETITION_WEIGHT),
        mediumThreshold: parseFloatOrUndefined(env.CONFUSION_MEDIUM_THRESHOLD),
        highThreshold: parseFloatOrUndefined(env.CONFUSION_HIGH_THRESHOLD),
      },
      flashcards: {
        retentionCeiling: parseIntOrUndefined(env.FLASHCARD_RETENTION_CEILING),
        dedupWindowMs: parseIntOrUndefined(env.FLASHCARD_DEDUP_WINDOW_MS),
      },
    },
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses and validates configuration from an environment.
 *
 * @throws {ConfigValidationError} when a value has the wrong shape
 *
 * @example
 * ```typescript
 * const testConfig = parseConfig({ NODE_ENV: 'test', DATABASE_PATH: ':memory:' });
 * ```
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse(loadFromEnvironment(env));

  if (!result.success) {
    const invalidVars = result.error.errors.map((issue) => ({
      name: issue.path.join('.'),
      reason: issue.message,
    }));
    const details = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${details}`, [], invalidVars);
  }

  return result.data;
}

/**
 * Checks the requirements that only apply in production.
 *
 * In production mode ANTHROPIC_API_KEY is REQUIRED. In development/test
 * mode it is optional; commands that need the model fail when they start.
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 *
 * @example
 * ```typescript
 * try {
 *   validateConfig();
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Missing vars:', error.missingVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function validateConfig(target: Config = config): void {
  if (target.server.nodeEnv !== 'production') {
    return;
  }

  const missingVars: string[] = [];
  if (!target.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }
  if (target.database.path === ':memory:') {
    throw new ConfigValidationError(
      'Invalid configuration: DATABASE_PATH: an in-memory database loses all history on restart',
      [],
      [{ name: 'DATABASE_PATH', reason: 'an in-memory database loses all history on restart' }]
    );
  }

  if (missingVars.length > 0) {
    throw new ConfigValidationError(
      `Missing required environment variables: ${missingVars.join(', ')}`,
      missingVars
    );
  }
}

// ============================================================================
// Configuration Export
// ============================================================================

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    console.error('Invalid configuration schema:');
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

/**
 * The validated, type-safe configuration object.
 */
export const config: Config = loadConfig();

export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

export default config;
