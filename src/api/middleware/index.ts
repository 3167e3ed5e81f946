/**
 * Middleware Barrel Export
 *
 * @example
 * ```typescript
 * import { errorHandler, loggerMiddleware } from './middleware';
 *
 * app.onError(errorHandler());
 * app.use('*', loggerMiddleware());
 * ```
 */

export {
  errorHandler,
  AppError,
  ErrorCodes,
  TUTOR_ERROR_STATUS,
  type ErrorCode,
} from './error-handler';

export {
  loggerMiddleware,
  formatResponseTime,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './logger';

export { parseBody, parseQuery } from './validate';
