/**
 * Debug Mentor API Server
 *
 * Hono application for the tutoring core, served with @hono/node-server.
 *
 * Features:
 * - Request logging with response times
 * - Consistent JSON error responses with stable tutoring error codes
 * - Health check endpoint
 *
 * Usage:
 *   npm start
 *
 * Environment Variables:
 *   PORT - Port to listen on (default: 3001)
 *   HOST - Interface to bind (default: 0.0.0.0)
 *   NODE_ENV - Environment mode (development/production/test)
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { TutoringOrchestrator } from '@/core/orchestrator';
import { errorHandler, loggerMiddleware, type LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';

export interface AppOptions {
  logger?: Partial<LoggerConfig>;
}

/**
 * Creates the Hono application.
 *
 * The error handler is registered with `onError`: Hono catches route errors
 * itself, so middleware never sees them.
 *
 * @example
 * ```typescript
 * const app = createApp(orchestrator);
 * const res = await app.request('/health');
 * ```
 */
export function createApp(orchestrator: TutoringOrchestrator, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  app.use('*', loggerMiddleware(options.logger));

  app.route('/health', healthRoutes());

  app.route('/api', createApiRouter(orchestrator));

  app.notFound((c) => {
    return error('ROUTE_NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404);
  });

  return app;
}

export interface ServerOptions {
  port: number;
  host: string;
  nodeEnv: string;
}

/**
 * Starts the HTTP server and installs shutdown handlers.
 *
 * @param onClose - Runs after the server stops accepting connections (e.g., closing the database)
 */
export function startServer(
  orchestrator: TutoringOrchestrator,
  options: ServerOptions,
  onClose: () => void = () => {}
): ServerType {
  const app = createApp(orchestrator);

  const server = serve({ fetch: app.fetch, port: options.port, hostname: options.host }, (info) => {
    console.log('');
    console.log(`[Server] Debug Mentor API listening on http://${info.address}:${info.port}`);
    console.log(`[Server] Environment: ${options.nodeEnv}`);
    console.log(`[Server] Health: http://localhost:${info.port}/health`);
    console.log(`[Server] API:    http://localhost:${info.port}/api`);
    console.log('');
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close((closeError) => {
      if (closeError) {
        console.error('[Server] Error while closing:', closeError);
      }
      onClose();
      process.exit(closeError ? 1 : 0);
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}
