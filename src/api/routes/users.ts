/**
 * User API Routes
 *
 * Everything addressed by learner id: messages, preferences, confusion,
 * flashcards and the session history.
 *
 * Endpoints:
 * - POST /:userId/messages                          - Handle a learner message
 * - GET  /:userId                                   - Preferences and mode
 * - PUT  /:userId/mode                              - Switch learning/debugging
 * - PUT  /:userId/preferences                       - Set learning style
 * - GET  /:userId/confusion                         - Latest confusion state
 * - GET  /:userId/flashcards                        - List flashcards
 * - POST /:userId/flashcards/:flashcardId/review    - Record a review
 * - GET  /:userId/session                           - Export history
 * - PUT  /:userId/session                           - Restore history
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { TutoringOrchestrator } from '@/core/orchestrator';
import { serializeHistory } from '@/core/ledger';
import { parseBody, parseQuery } from '../middleware/validate';
import {
  flashcardQuerySchema,
  messageRequestSchema,
  modeRequestSchema,
  preferencesRequestSchema,
  reviewRequestSchema,
} from '../types';
import { success } from '../utils/response';

/**
 * Creates the users router.
 *
 * @example
 * ```typescript
 * app.route('/api/users', usersRoutes(orchestrator));
 * ```
 */
export function usersRoutes(orchestrator: TutoringOrchestrator): Hono {
  const router = new Hono();

  /**
   * POST /:userId/messages
   *
   * Request body: { message, code?, language?, sessionId? }
   * Response: 200 OK with the TutorDecision
   *
   * A client that disconnects cancels the request; nothing is recorded.
   */
  router.post('/:userId/messages', async (c) => {
    const body = await parseBody(c, messageRequestSchema);

    const decision = await orchestrator.handleMessage({
      userId: c.req.param('userId'),
      message: body.message,
      code: body.code,
      language: body.language,
      sessionId: body.sessionId,
      signal: c.req.raw.signal,
    });

    return success(c, decision);
  });

  router.get('/:userId', async (c) => {
    return success(c, await orchestrator.getUser(c.req.param('userId')));
  });

  router.put('/:userId/mode', async (c) => {
    const { mode } = await parseBody(c, modeRequestSchema);
    return success(c, await orchestrator.switchMode(c.req.param('userId'), mode));
  });

  router.put('/:userId/preferences', async (c) => {
    const { learningStyle } = await parseBody(c, preferencesRequestSchema);
    return success(c, await orchestrator.setLearningStyle(c.req.param('userId'), learningStyle));
  });

  /**
   * GET /:userId/confusion
   *
   * Response: the ConfusionState, or null before the user's first message
   * since the server started.
   */
  router.get('/:userId/confusion', (c) => {
    return success(c, orchestrator.getConfusionState(c.req.param('userId')));
  });

  // ===========================================================================
  // Flashcards
  // ===========================================================================

  /**
   * GET /:userId/flashcards?type=logic&due=true&unreviewed=false&limit=10
   */
  router.get('/:userId/flashcards', async (c) => {
    const query = parseQuery(c, flashcardQuerySchema);

    const cards = await orchestrator.listFlashcards(c.req.param('userId'), {
      errorType: query.type,
      dueOnly: query.due,
      unreviewedOnly: query.unreviewed,
      limit: query.limit,
    });

    return success(c, cards);
  });

  router.post('/:userId/flashcards/:flashcardId/review', async (c) => {
    const { rating } = await parseBody(c, reviewRequestSchema);

    const card = await orchestrator.reviewFlashcard(
      c.req.param('userId'),
      c.req.param('flashcardId'),
      rating
    );

    return success(c, card);
  });

  // ===========================================================================
  // Session History
  // ===========================================================================

  router.get('/:userId/session', async (c) => {
    const history = await orchestrator.exportSession(c.req.param('userId'));
    return success(c, serializeHistory(history));
  });

  /**
   * PUT /:userId/session
   *
   * Request body: a snapshot as returned by GET. The snapshot is validated by
   * the core; a malformed one is rejected with MALFORMED_SNAPSHOT and the
   * current history is left alone.
   */
  router.put('/:userId/session', async (c) => {
    const snapshot = await parseBody(c, z.unknown());
    const history = await orchestrator.restoreSession(c.req.param('userId'), snapshot);
    return success(c, serializeHistory(history));
  });

  return router;
}
