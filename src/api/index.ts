/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 * const app = createApp(orchestrator);
 * ```
 */

export { createApp, startServer, type AppOptions, type ServerOptions } from './server';
export { createApiRouter, healthRoutes, usersRoutes, hintsRoutes, APP_VERSION } from './routes';
export * from './middleware';
export type { ApiResponse, ApiErrorResponse, ApiError, ApiResult } from './types';
