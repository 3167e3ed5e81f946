/**
 * Session History Repository Implementation
 *
 * Implements the core's SessionStore contract. Each learner's history is a
 * single row holding the codec's JSON snapshot; persisting replaces the row
 * wholesale, so the stored history is always one the ledger produced.
 */

import { desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { sessionHistories } from '../schema';
import type { SessionHistory } from '@/core/models';
import type { SessionStore } from '@/core/gateway';
import { parseHistorySnapshot, serializeHistory } from '@/core/ledger';

/** Listing entry for a stored history, read without parsing the snapshot. */
export interface SessionHistorySummary {
  userId: string;
  interactionCount: number;
  startedAt: Date;
  lastActiveAt: Date;
}

/**
 * Repository for session history snapshots.
 *
 * @example
 * ```typescript
 * const repo = new SessionHistoryRepository(db);
 * await repo.persist(ledger.snapshot('user_42'));
 * const history = await repo.load('user_42');
 * ```
 */
export class SessionHistoryRepository implements SessionStore {
  constructor(private readonly db: AppDatabase) {}

  async persist(history: SessionHistory): Promise<void> {
    const row = {
      snapshot: serializeHistory(history),
      interactionCount: history.interactions.length,
      startedAt: history.startedAt,
      lastActiveAt: history.lastActiveAt,
      updatedAt: new Date(),
    };

    await this.db
      .insert(sessionHistories)
      .values({ userId: history.userId, ...row })
      .onConflictDoUpdate({ target: sessionHistories.userId, set: row });
  }

  /**
   * Loads and validates a stored snapshot.
   *
   * @throws TutorError MALFORMED_SNAPSHOT if the stored JSON no longer parses
   */
  async load(userId: string): Promise<SessionHistory | null> {
    const result = await this.db
      .select({ snapshot: sessionHistories.snapshot })
      .from(sessionHistories)
      .where(eq(sessionHistories.userId, userId))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return parseHistorySnapshot(result[0].snapshot, { operation: 'load', userId });
  }

  /**
   * Lists stored histories, most recently active first.
   */
  async listSummaries(): Promise<SessionHistorySummary[]> {
    return this.db
      .select({
        userId: sessionHistories.userId,
        interactionCount: sessionHistories.interactionCount,
        startedAt: sessionHistories.startedAt,
        lastActiveAt: sessionHistories.lastActiveAt,
      })
      .from(sessionHistories)
      .orderBy(desc(sessionHistories.lastActiveAt));
  }
}
