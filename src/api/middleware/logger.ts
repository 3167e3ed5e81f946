/**
 * Request Logger Middleware
 *
 * One line per request: `[API] METHOD path status - Nms`. Colorized outside
 * production; health checks are skipped.
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ colorize: false }));
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  /** Path prefixes that are never logged */
  skipPaths: string[];
  colorize: boolean;
  /** Where lines go; console.log unless a test captures them */
  write: (line: string) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  return colors.green;
}

export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const elapsed = formatResponseTime(Math.round(performance.now() - startTime));

    const method = c.req.method;
    const status = c.res.status;

    finalConfig.write(
      finalConfig.colorize
        ? `${finalConfig.prefix} ${method.padEnd(7)} ${path} ${getStatusColor(status)}${status}${colors.reset} - ${colors.dim}${elapsed}${colors.reset}`
        : `${finalConfig.prefix} ${method} ${path} ${status} - ${elapsed}`
    );
  };
}
