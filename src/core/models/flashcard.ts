/**
 * Flashcard Domain Types
 *
 * A flashcard is a front/back remediation record derived from a detected
 * error. Cards are deduplicated per user by error signature. Once created,
 * only review metadata changes: the review count, the last review time and
 * the spaced-repetition schedule.
 */

import type { ErrorType } from './code-error';

/**
 * Learning state of a flashcard in the FSRS model.
 *
 * - 'new': never reviewed
 * - 'learning': in the initial learning phase
 * - 'review': graduated to regular review intervals
 * - 'relearning': forgotten after graduating, back in learning
 */
export type FSRSLearningState = 'new' | 'learning' | 'review' | 'relearning';

/**
 * Spaced-repetition schedule for one flashcard.
 */
export interface FSRSState {
  /** Inherent difficulty of the card (higher = harder) */
  difficulty: number;
  /** Days until recall probability drops to the target retention */
  stability: number;
  /** When the card should next be reviewed */
  due: Date;
  /** Last review, or null if never reviewed */
  lastReview: Date | null;
  /** Successful repetitions */
  reps: number;
  /** Times the card was forgotten after being learned */
  lapses: number;
  state: FSRSLearningState;
}

/**
 * Dedup key for flashcards: error type, normalized description and line.
 */
export interface ErrorSignature {
  errorType: ErrorType;
  description: string;
  lineNumber: number | null;
}

/**
 * A remediation card owned by one user.
 *
 * @example
 * ```typescript
 * const card: Flashcard = {
 *   id: 'fc_9d1c...',
 *   userId: 'user_42',
 *   front: 'Missing colon after if statement',
 *   back: 'Add ":" at the end of the if condition',
 *   context: 'python line 4: if x > 3',
 *   errorType: 'syntax',
 *   lineNumber: 4,
 *   signature: 'syntax|missing colon after if statement|4',
 *   createdAt: new Date(),
 *   reviewCount: 0,
 *   lastReviewedAt: null,
 *   fsrs: scheduler.createInitialState(),
 * };
 * ```
 */
export interface Flashcard {
  id: string;
  userId: string;
  /** The error description */
  front: string;
  /** The correction */
  back: string;
  /** Where the error was seen */
  context: string;
  errorType: ErrorType;
  lineNumber: number | null;
  /** Serialized {@link ErrorSignature} */
  signature: string;
  createdAt: Date;
  reviewCount: number;
  lastReviewedAt: Date | null;
  fsrs: FSRSState;
}

/**
 * Filters for listing a user's flashcards.
 */
export interface FlashcardFilters {
  errorType?: ErrorType;
  /** Only cards whose FSRS due date has passed */
  dueOnly?: boolean;
  /** Only cards that were never reviewed */
  unreviewedOnly?: boolean;
  /** Maximum number of cards, oldest first */
  limit?: number;
}
