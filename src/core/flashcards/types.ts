/**
 * Flashcard Curator Types
 */

import type { Flashcard } from '../models';
import type { TutorError } from '../errors';

export interface FlashcardCuratorConfig {
  /** Maximum flashcards kept per user; older ones are evicted past it */
  retentionCeiling: number;
  /**
   * How far back a matching signature counts as a duplicate, in ms.
   * null means the whole history.
   */
  dedupWindowMs: number | null;
}

export const DEFAULT_FLASHCARD_CURATOR_CONFIG: FlashcardCuratorConfig = {
  retentionCeiling: 500,
  dedupWindowMs: null,
};

/**
 * Outcome of curating one error.
 */
export interface CurationResult {
  /** The new card, or null when it duplicated an existing one */
  flashcard: Flashcard | null;
  /** Cards removed to stay under the retention ceiling */
  evicted: Flashcard[];
  /** FLASHCARD_LIMIT_REACHED when something was evicted */
  warnings: TutorError[];
}
