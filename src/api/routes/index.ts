/**
 * API Router
 *
 * Mounts every route module under /api. Routes receive the orchestrator
 * from the composition root rather than building their own.
 */

import { Hono } from 'hono';
import type { TutoringOrchestrator } from '@/core/orchestrator';
import { success } from '../utils/response';
import { usersRoutes } from './users';
import { hintsRoutes } from './hints';
import { APP_VERSION } from './health';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { usersRoutes } from './users';
export { hintsRoutes } from './hints';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

export function createApiRouter(orchestrator: TutoringOrchestrator): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Debug Mentor API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/users/:userId/messages', description: 'Send a learner message' },
        { path: '/api/users/:userId', description: 'Preferences, mode and confusion' },
        { path: '/api/users/:userId/flashcards', description: 'Flashcards and reviews' },
        { path: '/api/users/:userId/session', description: 'Export and restore history' },
        { path: '/api/hints/:sessionId', description: 'Reveal debugging hints' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/users', usersRoutes(orchestrator));
  router.route('/hints', hintsRoutes(orchestrator));

  return router;
}
