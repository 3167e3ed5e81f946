/**
 * Session History Snapshot Codec
 *
 * Converts a SessionHistory to and from its JSON form. Dates travel as
 * ISO-8601 strings. Parsing is strict: anything that does not match the
 * schema is rejected as a malformed snapshot rather than patched up.
 *
 * Ordering and ownership invariants are checked by the ledger on restore;
 * this module only checks shape.
 */

import { z } from 'zod';
import type { SessionHistory } from '../models';
import { TutorError, TutorErrorCodes, type TutorErrorContext } from '../errors';

const dateField = z
  .union([z.string().datetime({ offset: true }), z.date()])
  .transform((value) => new Date(value));

const nonEmpty = z.string().trim().min(1);

const confusionLevelSchema = z.enum(['low', 'medium', 'high']);
const modeSchema = z.enum(['learning', 'debugging']);

const interactionSchema = z.object({
  id: nonEmpty,
  userId: nonEmpty,
  sequence: z.number().int().nonnegative(),
  mode: modeSchema,
  message: z.string(),
  code: z.string().nullable(),
  response: z.string(),
  confusionLevel: confusionLevelSchema,
  flashcardGenerated: z.boolean(),
  timestamp: dateField,
});

const fsrsStateSchema = z.object({
  difficulty: z.number(),
  stability: z.number(),
  due: dateField,
  lastReview: dateField.nullable(),
  reps: z.number().int().nonnegative(),
  lapses: z.number().int().nonnegative(),
  state: z.enum(['new', 'learning', 'review', 'relearning']),
});

const flashcardSchema = z.object({
  id: nonEmpty,
  userId: nonEmpty,
  front: nonEmpty,
  back: nonEmpty,
  context: nonEmpty,
  errorType: z.enum(['syntax', 'logic', 'runtime']),
  lineNumber: z.number().int().positive().nullable(),
  signature: nonEmpty,
  createdAt: dateField,
  reviewCount: z.number().int().nonnegative(),
  lastReviewedAt: dateField.nullable(),
  fsrs: fsrsStateSchema,
});

const modeChangeSchema = z.object({
  userId: nonEmpty,
  from: modeSchema,
  to: modeSchema,
  at: dateField,
});

const confusionTransitionSchema = z.object({
  userId: nonEmpty,
  from: confusionLevelSchema,
  to: confusionLevelSchema,
  score: z.number().min(0).max(1),
  at: dateField,
});

export const sessionHistorySchema = z.object({
  userId: nonEmpty,
  interactions: z.array(interactionSchema),
  flashcards: z.array(flashcardSchema),
  modeChanges: z.array(modeChangeSchema),
  confusionTransitions: z.array(confusionTransitionSchema),
  startedAt: dateField,
  lastActiveAt: dateField,
});

/** JSON form of a session history, as stored and exported. */
export type SerializedSessionHistory = z.input<typeof sessionHistorySchema>;

/**
 * Converts a history into plain JSON data (dates as ISO strings).
 */
export function serializeHistory(history: SessionHistory): SerializedSessionHistory {
  return {
    userId: history.userId,
    interactions: history.interactions.map((interaction) => ({
      ...interaction,
      timestamp: interaction.timestamp.toISOString(),
    })),
    flashcards: history.flashcards.map((card) => ({
      ...card,
      createdAt: card.createdAt.toISOString(),
      lastReviewedAt: card.lastReviewedAt?.toISOString() ?? null,
      fsrs: {
        ...card.fsrs,
        due: card.fsrs.due.toISOString(),
        lastReview: card.fsrs.lastReview?.toISOString() ?? null,
      },
    })),
    modeChanges: history.modeChanges.map((change) => ({
      ...change,
      at: change.at.toISOString(),
    })),
    confusionTransitions: history.confusionTransitions.map((transition) => ({
      ...transition,
      at: transition.at.toISOString(),
    })),
    startedAt: history.startedAt.toISOString(),
    lastActiveAt: history.lastActiveAt.toISOString(),
  };
}

/**
 * Parses untrusted snapshot data into a SessionHistory.
 *
 * @throws TutorError MALFORMED_SNAPSHOT when the data does not match the schema
 */
export function parseHistorySnapshot(
  raw: unknown,
  context: TutorErrorContext = {}
): SessionHistory {
  const result = sessionHistorySchema.safeParse(raw);

  if (!result.success) {
    const first = result.error.errors[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new TutorError(
      TutorErrorCodes.MALFORMED_SNAPSHOT,
      `Session snapshot is malformed${where}: ${first?.message ?? 'invalid data'}`,
      context,
      result.error
    );
  }

  const history: SessionHistory = result.data;
  return history;
}
