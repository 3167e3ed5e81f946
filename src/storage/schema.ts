/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema definitions for SQLite. Two tables back the tutor:
 * - Users: learning style and tutoring mode per learner
 * - Session Histories: one JSON snapshot per learner, stored verbatim
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 * The DDL in ./migrations must be kept in step with these definitions.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

/**
 * Users Table
 *
 * Mode values:
 * - 'learning': conceptual questions answered with explanations
 * - 'debugging': code submissions analyzed, with staged hints
 */
export const users = sqliteTable('users', {
  // Identity key supplied by the surrounding system
  id: text('id').primaryKey(),

  learningStyle: text('learning_style', { enum: ['ELI5', 'Visual', 'Standard'] })
    .notNull()
    .default('Standard'),

  mode: text('mode', { enum: ['learning', 'debugging'] })
    .notNull()
    .default('learning'),

  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Session Histories Table
 *
 * The full serialized history of one learner. The snapshot column holds the
 * JSON written by the snapshot codec; the timestamp columns duplicate the
 * snapshot's own bounds so histories can be listed without parsing.
 */
export const sessionHistories = sqliteTable(
  'session_histories',
  {
    userId: text('user_id').primaryKey(),

    // Serialized SessionHistory (see core/ledger/snapshot-codec)
    snapshot: text('snapshot', { mode: 'json' }).notNull(),

    interactionCount: integer('interaction_count').notNull().default(0),

    startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),

    lastActiveAt: integer('last_active_at', { mode: 'timestamp_ms' }).notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    lastActiveIdx: index('session_histories_last_active_idx').on(table.lastActiveAt),
  })
);

// Inferred row types
export type UserRow = typeof users.$inferSelect;
export type NewUserRow = typeof users.$inferInsert;
export type SessionHistoryRow = typeof sessionHistories.$inferSelect;
export type NewSessionHistoryRow = typeof sessionHistories.$inferInsert;
