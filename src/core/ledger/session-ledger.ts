/**
 * Session Ledger - Append-Only Per-User History
 *
 * The ledger owns every learner's SessionHistory: interactions, flashcards,
 * mode changes and confusion transitions. It is the single source of truth
 * for export and restore.
 *
 * Rules:
 * - Appends never modify earlier entries. Interactions get a gapless
 *   `sequence` and are kept in non-decreasing timestamp order.
 * - Flashcards are the exception to append-only: their review metadata can
 *   be updated, and the curator may evict cards past the retention ceiling.
 * - Every method is synchronous, so each call is atomic with respect to one
 *   user's history. Histories of different users are separate map entries
 *   and never touch each other.
 * - `restore` validates the snapshot fully before replacing anything.
 */

import { randomUUID } from 'crypto';
import type {
  ConfusionLevel,
  ConfusionTransition,
  Flashcard,
  FSRSState,
  Interaction,
  ModeChange,
  SessionHistory,
  TutorMode,
} from '../models';
import { createEmptyHistory } from '../models';
import { TutorError, TutorErrorCodes } from '../errors';

/**
 * Data for a new interaction. The ledger assigns `sequence` (and `id` when
 * not supplied).
 */
export interface AppendInteractionInput {
  id?: string;
  userId: string;
  mode: TutorMode;
  message: string;
  code: string | null;
  response: string;
  confusionLevel: ConfusionLevel;
  flashcardGenerated: boolean;
  timestamp: Date;
}

/** Review metadata, the only mutable part of a flashcard. */
export interface FlashcardReviewUpdate {
  reviewCount: number;
  lastReviewedAt: Date;
  fsrs: FSRSState;
}

/**
 * Generates a unique interaction ID with the 'int' prefix.
 */
function generateInteractionId(): string {
  return `int_${randomUUID()}`;
}

function laterOf(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

export class SessionLedger {
  /** Histories keyed by user id */
  private histories: Map<string, SessionHistory> = new Map();

  /**
   * @param now - Clock used when a ledger is opened implicitly
   */
  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Whether a history is loaded for the user. */
  has(userId: string): boolean {
    return this.histories.has(userId);
  }

  /**
   * Makes sure a history exists for the user, creating an empty one if needed.
   */
  open(userId: string, at: Date = this.now()): void {
    if (!this.histories.has(userId)) {
      this.histories.set(userId, createEmptyHistory(userId, at));
    }
  }

  /**
   * Appends an interaction.
   *
   * A timestamp earlier than the previous interaction's is raised to it,
   * keeping the sequence ordered by time.
   */
  append(input: AppendInteractionInput): Interaction {
    const history = this.require(input.userId, input.timestamp);
    const previous = history.interactions[history.interactions.length - 1];
    const timestamp = previous ? laterOf(input.timestamp, previous.timestamp) : input.timestamp;

    const interaction: Interaction = {
      id: input.id ?? generateInteractionId(),
      userId: input.userId,
      sequence: history.interactions.length,
      mode: input.mode,
      message: input.message,
      code: input.code,
      response: input.response,
      confusionLevel: input.confusionLevel,
      flashcardGenerated: input.flashcardGenerated,
      timestamp,
    };

    history.interactions.push(interaction);
    history.lastActiveAt = laterOf(history.lastActiveAt, timestamp);
    return { ...interaction };
  }

  /**
   * Records a switch between modes. Never truncates anything.
   */
  appendModeChange(userId: string, from: TutorMode, to: TutorMode, at: Date): ModeChange {
    const history = this.require(userId, at);
    const change: ModeChange = { userId, from, to, at };
    history.modeChanges.push(change);
    history.lastActiveAt = laterOf(history.lastActiveAt, at);
    return { ...change };
  }

  appendConfusionTransition(transition: ConfusionTransition): void {
    const history = this.require(transition.userId, transition.at);
    history.confusionTransitions.push({ ...transition });
  }

  /**
   * The level of the most recent confusion transition, or null if the user
   * has never changed level.
   */
  lastConfusionLevel(userId: string): ConfusionLevel | null {
    const transitions = this.histories.get(userId)?.confusionTransitions ?? [];
    return transitions[transitions.length - 1]?.to ?? null;
  }

  appendFlashcard(card: Flashcard): void {
    const history = this.require(card.userId, card.createdAt);
    history.flashcards.push(structuredClone(card));
    history.lastActiveAt = laterOf(history.lastActiveAt, card.createdAt);
  }

  /**
   * Removes a flashcard (retention eviction).
   *
   * @returns The removed card, or null if the user has no such card
   */
  evictFlashcard(userId: string, flashcardId: string): Flashcard | null {
    const history = this.histories.get(userId);
    if (!history) {
      return null;
    }
    const index = history.flashcards.findIndex((card) => card.id === flashcardId);
    if (index === -1) {
      return null;
    }
    const [removed] = history.flashcards.splice(index, 1);
    return removed ?? null;
  }

  /**
   * Replaces a flashcard's review metadata.
   *
   * @throws TutorError NOT_FOUND if the user has no such card
   */
  recordFlashcardReview(userId: string, flashcardId: string, update: FlashcardReviewUpdate): Flashcard {
    const card = this.histories.get(userId)?.flashcards.find((c) => c.id === flashcardId);
    if (!card) {
      throw new TutorError(
        TutorErrorCodes.NOT_FOUND,
        `Flashcard '${flashcardId}' not found`,
        { operation: 'recordFlashcardReview', userId }
      );
    }
    card.reviewCount = update.reviewCount;
    card.lastReviewedAt = update.lastReviewedAt;
    card.fsrs = { ...update.fsrs };
    return structuredClone(card);
  }

  /** Copies of the user's flashcards, in insertion order. */
  flashcards(userId: string): Flashcard[] {
    return structuredClone(this.histories.get(userId)?.flashcards ?? []);
  }

  /** Copies of the user's last `count` interactions, oldest first. */
  recentInteractions(userId: string, count: number): Interaction[] {
    if (count <= 0) {
      return [];
    }
    const interactions = this.histories.get(userId)?.interactions ?? [];
    return structuredClone(interactions.slice(-count));
  }

  /**
   * Returns a deep copy of the user's history.
   * A user with no history gets an empty one (not stored).
   */
  snapshot(userId: string): SessionHistory {
    const history = this.histories.get(userId);
    return history ? structuredClone(history) : createEmptyHistory(userId, this.now());
  }

  /**
   * Replaces the user's in-memory history with a snapshot.
   *
   * @throws TutorError MALFORMED_SNAPSHOT if the snapshot belongs to another
   *   user, has sequence gaps, or has interaction timestamps that go backwards.
   *   The live history is left untouched in that case.
   */
  restore(userId: string, snapshot: SessionHistory): void {
    validateSnapshot(userId, snapshot);
    this.histories.set(userId, structuredClone(snapshot));
  }

  /** Drops the user's in-memory history. */
  clear(userId: string): void {
    this.histories.delete(userId);
  }

  private require(userId: string, at: Date): SessionHistory {
    this.open(userId, at);
    const history = this.histories.get(userId);
    if (!history) {
      throw new Error(`Ledger for user '${userId}' could not be opened`);
    }
    return history;
  }
}

function malformed(userId: string, message: string): TutorError {
  return new TutorError(TutorErrorCodes.MALFORMED_SNAPSHOT, message, {
    operation: 'restore',
    userId,
  });
}

function validateSnapshot(userId: string, snapshot: SessionHistory): void {
  if (snapshot.userId !== userId) {
    throw malformed(userId, `Snapshot belongs to user '${snapshot.userId}', not '${userId}'`);
  }

  let previous: Interaction | undefined;
  for (const [index, interaction] of snapshot.interactions.entries()) {
    if (interaction.userId !== userId) {
      throw malformed(userId, `Interaction ${index} belongs to another user`);
    }
    if (interaction.sequence !== index) {
      throw malformed(userId, `Interaction ${index} has sequence ${interaction.sequence}`);
    }
    if (previous && interaction.timestamp.getTime() < previous.timestamp.getTime()) {
      throw malformed(userId, `Interaction timestamps go backwards at position ${index}`);
    }
    previous = interaction;
  }

  for (const card of snapshot.flashcards) {
    if (card.userId !== userId) {
      throw malformed(userId, `Flashcard '${card.id}' belongs to another user`);
    }
  }

  for (const change of snapshot.modeChanges) {
    if (change.userId !== userId) {
      throw malformed(userId, 'A mode change belongs to another user');
    }
  }
}
