/**
 * Health Check Route
 *
 * GET /health, used by process supervisors and load balancers.
 * Response: { success: true, data: { status: 'ok', timestamp, environment, version } }
 */

import { Hono } from 'hono';
import { config } from '@/config';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 */
  timestamp: string;
  environment: string;
  version: string;
}

export const APP_VERSION = '0.1.0';

export function healthRoutes(): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      version: APP_VERSION,
    };

    return success(c, healthData);
  });

  return router;
}
