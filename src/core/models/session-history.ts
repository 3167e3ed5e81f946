/**
 * Session History Domain Types
 *
 * The session history is the per-user aggregate kept by the session ledger:
 * every interaction in append order, the user's flashcards, mode switches
 * and confusion transitions. It is the single source of truth for history
 * export and restore; stores persist and return it verbatim.
 */

import type { ConfusionLevel, ConfusionTransition } from './confusion';
import type { Flashcard } from './flashcard';
import type { TutorMode } from './user';

/**
 * One exchange between the learner and the tutor.
 */
export interface Interaction {
  id: string;
  userId: string;
  /** 0-based position in the user's ledger, with no gaps */
  sequence: number;
  /** Mode the interaction was handled in */
  mode: TutorMode;
  /** Inbound message text */
  message: string;
  /** Inbound code, for debugging submissions */
  code: string | null;
  /** Outbound response text */
  response: string;
  /** Confusion level after this message was scored */
  confusionLevel: ConfusionLevel;
  flashcardGenerated: boolean;
  timestamp: Date;
}

/**
 * A recorded switch between learning and debugging.
 */
export interface ModeChange {
  userId: string;
  from: TutorMode;
  to: TutorMode;
  at: Date;
}

/**
 * Everything the tutor knows about one learner's history.
 */
export interface SessionHistory {
  userId: string;
  /** Ordered by timestamp, in append order */
  interactions: Interaction[];
  flashcards: Flashcard[];
  modeChanges: ModeChange[];
  confusionTransitions: ConfusionTransition[];
  startedAt: Date;
  lastActiveAt: Date;
}

/**
 * Creates an empty history for a user seen for the first time.
 */
export function createEmptyHistory(userId: string, now: Date): SessionHistory {
  return {
    userId,
    interactions: [],
    flashcards: [],
    modeChanges: [],
    confusionTransitions: [],
    startedAt: now,
    lastActiveAt: now,
  };
}
