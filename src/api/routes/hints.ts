/**
 * Hint API Routes
 *
 * Endpoints:
 * - POST /:sessionId/next - Reveal the next tier of a debugging session's ladder
 * - POST /:sessionId/jump - Reveal a given level (skipping needs allowSkip)
 *
 * Ladder protocol violations (HINT_EXHAUSTED, SKIP_NOT_ALLOWED) come back
 * from the core as Result values and are answered with 409.
 */

import { Hono } from 'hono';
import type { TutoringOrchestrator } from '@/core/orchestrator';
import { parseBody } from '../middleware/validate';
import { hintJumpRequestSchema } from '../types';
import { success } from '../utils/response';

export function hintsRoutes(orchestrator: TutoringOrchestrator): Hono {
  const router = new Hono();

  router.post('/:sessionId/next', async (c) => {
    const result = await orchestrator.requestNextHint(c.req.param('sessionId'));
    if (!result.ok) {
      throw result.error;
    }
    return success(c, result.value);
  });

  /**
   * POST /:sessionId/jump
   *
   * Request body: { level: 1 | 2 | 3, allowSkip?: boolean }
   */
  router.post('/:sessionId/jump', async (c) => {
    const { level, allowSkip } = await parseBody(c, hintJumpRequestSchema);

    const result = await orchestrator.jumpToHint(c.req.param('sessionId'), level, allowSkip);
    if (!result.ok) {
      throw result.error;
    }
    return success(c, result.value);
  });

  return router;
}
