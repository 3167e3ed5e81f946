/**
 * Flashcard Curator
 *
 * Turns detected errors into flashcards, one per error signature per user.
 *
 * Retention: each user keeps at most `retentionCeiling` cards. When a new
 * card pushes the count past it, the curator evicts the oldest card that has
 * been reviewed at least once; if no card has been reviewed, the oldest card
 * overall. Ties on creation time go to the card that was added first. An
 * eviction is reported as a FLASHCARD_LIMIT_REACHED warning and never fails
 * the interaction.
 *
 * Cards are written straight into the user's ledger, so `curate` must run
 * inside the caller's commit for that user.
 */

import { randomUUID } from 'crypto';
import type { CodeError, Flashcard } from '../models';
import { TutorError, TutorErrorCodes, invalidInput } from '../errors';
import type { SessionLedger } from '../ledger';
import type { FSRSScheduler, ReviewRating } from '../fsrs';
import { serializeSignature, signatureOf } from './signature';
import {
  DEFAULT_FLASHCARD_CURATOR_CONFIG,
  type CurationResult,
  type FlashcardCuratorConfig,
} from './types';

/**
 * Generates a unique flashcard ID with the 'fc' prefix.
 */
function generateFlashcardId(): string {
  return `fc_${randomUUID()}`;
}

function oldestIndex(cards: readonly Flashcard[], include: (card: Flashcard) => boolean): number {
  let found = -1;
  let foundAt = Number.POSITIVE_INFINITY;
  cards.forEach((card, index) => {
    const created = card.createdAt.getTime();
    if (include(card) && created < foundAt) {
      found = index;
      foundAt = created;
    }
  });
  return found;
}

/**
 * Index of the card to evict, per the retention policy above.
 */
function evictionIndex(cards: readonly Flashcard[]): number {
  const reviewed = oldestIndex(cards, (card) => card.reviewCount > 0);
  return reviewed !== -1 ? reviewed : oldestIndex(cards, () => true);
}

export class FlashcardCurator {
  private config: FlashcardCuratorConfig;

  constructor(
    private readonly ledger: SessionLedger,
    private readonly scheduler: FSRSScheduler,
    config: Partial<FlashcardCuratorConfig> = {}
  ) {
    this.config = { ...DEFAULT_FLASHCARD_CURATOR_CONFIG, ...config };
  }

  /**
   * Creates a flashcard for `error` unless the user already has one with the
   * same signature inside the dedup window.
   *
   * @param correction - Becomes the back of the card
   * @param context - Where the error was seen (language and offending line)
   * @throws TutorError INVALID_INPUT when the user id, description,
   *   correction or context is empty
   */
  curate(
    userId: string,
    error: CodeError,
    correction: string,
    context: string,
    now: Date
  ): CurationResult {
    const front = error.description.trim();
    const back = correction.trim();
    const where = context.trim();
    const errorContext = { operation: 'curateFlashcard', userId };

    if (userId.trim().length === 0) {
      throw invalidInput('Flashcard owner must not be empty', errorContext);
    }
    if (front.length === 0 || back.length === 0 || where.length === 0) {
      throw invalidInput('Flashcard front, back and context must not be empty', errorContext);
    }

    const signature = serializeSignature(signatureOf(error));
    const existing = this.ledger.flashcards(userId);
    if (this.isDuplicate(existing, signature, now)) {
      return { flashcard: null, evicted: [], warnings: [] };
    }

    const flashcard: Flashcard = {
      id: generateFlashcardId(),
      userId,
      front,
      back,
      context: where,
      errorType: error.errorType,
      lineNumber: error.lineNumber,
      signature,
      createdAt: now,
      reviewCount: 0,
      lastReviewedAt: null,
      fsrs: this.scheduler.createInitialState(now),
    };
    this.ledger.appendFlashcard(flashcard);

    const evicted = this.enforceCeiling(userId);
    const warnings = evicted.map(
      (card) =>
        new TutorError(
          TutorErrorCodes.FLASHCARD_LIMIT_REACHED,
          `Flashcard limit of ${this.config.retentionCeiling} reached; removed "${card.front}"`,
          errorContext
        )
    );
    for (const card of evicted) {
      console.warn(`[FlashcardCurator] Evicted flashcard ${card.id} for user ${userId}`);
    }

    return { flashcard, evicted, warnings };
  }

  /**
   * Same as `curate`, returning only the new card (or null for a duplicate).
   */
  maybeCreate(
    userId: string,
    error: CodeError,
    correction: string,
    context: string,
    now: Date = new Date()
  ): Flashcard | null {
    return this.curate(userId, error, correction, context, now).flashcard;
  }

  /**
   * Records a review: bumps the review count and reschedules the card.
   *
   * @throws TutorError NOT_FOUND for an unknown card
   */
  review(userId: string, flashcardId: string, rating: ReviewRating, now: Date = new Date()): Flashcard {
    const card = this.ledger.flashcards(userId).find((c) => c.id === flashcardId);
    if (!card) {
      throw new TutorError(TutorErrorCodes.NOT_FOUND, `Flashcard '${flashcardId}' not found`, {
        operation: 'reviewFlashcard',
        userId,
      });
    }

    return this.ledger.recordFlashcardReview(userId, flashcardId, {
      reviewCount: card.reviewCount + 1,
      lastReviewedAt: now,
      fsrs: this.scheduler.schedule(card.fsrs, rating, now),
    });
  }

  isDue(card: Flashcard, asOf: Date = new Date()): boolean {
    return this.scheduler.isDue(card.fsrs, asOf);
  }

  getConfig(): FlashcardCuratorConfig {
    return { ...this.config };
  }

  private isDuplicate(cards: readonly Flashcard[], signature: string, now: Date): boolean {
    const windowMs = this.config.dedupWindowMs;
    return cards.some(
      (card) =>
        card.signature === signature &&
        (windowMs === null || now.getTime() - card.createdAt.getTime() <= windowMs)
    );
  }

  private enforceCeiling(userId: string): Flashcard[] {
    const evicted: Flashcard[] = [];
    let cards = this.ledger.flashcards(userId);

    while (cards.length > this.config.retentionCeiling) {
      const victim = cards[evictionIndex(cards)];
      if (!victim) {
        break;
      }
      const removed = this.ledger.evictFlashcard(userId, victim.id);
      if (!removed) {
        break;
      }
      evicted.push(removed);
      cards = this.ledger.flashcards(userId);
    }

    return evicted;
  }
}
