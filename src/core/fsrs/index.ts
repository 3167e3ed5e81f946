/**
 * FSRS Module
 *
 * Spaced-repetition scheduling for flashcard reviews, built on ts-fsrs.
 *
 * @example
 * ```typescript
 * import { FSRSScheduler, type ReviewRating } from '@/core/fsrs';
 *
 * const scheduler = new FSRSScheduler();
 * const rating: ReviewRating = 'good';
 * const next = scheduler.schedule(card.fsrs, rating);
 * ```
 */

export { FSRSScheduler, type FSRSSchedulerConfig } from './scheduler';

export {
  type ReviewRating,
  REVIEW_RATINGS,
  toFSRSRating,
  toFSRSState,
  fromFSRSState,
} from './types';
