/**
 * FSRS Scheduler - Flashcard Review Scheduling
 *
 * Wraps the ts-fsrs library behind the flashcard's FSRSState. The schedule is
 * part of a flashcard's review metadata, the only part of a card that changes
 * after it is created.
 *
 * @see https://github.com/open-spaced-repetition/ts-fsrs for algorithm details
 */

import {
  FSRS,
  createEmptyCard,
  generatorParameters,
  type Card,
} from 'ts-fsrs';
import type { FSRSState } from '../models';
import { toFSRSRating, toFSRSState, fromFSRSState, type ReviewRating } from './types';

export interface FSRSSchedulerConfig {
  /** Longest interval between reviews, in days */
  maximumInterval: number;
  /** Target recall probability (0-1) */
  requestRetention: number;
}

const DEFAULT_CONFIG: FSRSSchedulerConfig = {
  maximumInterval: 365,
  requestRetention: 0.9,
};

/**
 * @example
 * ```typescript
 * const scheduler = new FSRSScheduler();
 * const fsrs = scheduler.createInitialState(card.createdAt);
 *
 * const next = scheduler.schedule(fsrs, 'good', new Date());
 * if (scheduler.isDue(next)) {
 *   // show the card again
 * }
 * ```
 */
export class FSRSScheduler {
  private fsrs: FSRS;
  private config: FSRSSchedulerConfig;

  constructor(config?: Partial<FSRSSchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    const params = generatorParameters({
      maximum_interval: this.config.maximumInterval,
      request_retention: this.config.requestRetention,
    });
    this.fsrs = new FSRS(params);
  }

  private toCard(state: FSRSState): Card {
    return {
      due: state.due,
      stability: state.stability,
      difficulty: state.difficulty,
      // ts-fsrs recomputes both from last_review while scheduling
      elapsed_days: 0,
      scheduled_days: 0,
      reps: state.reps,
      lapses: state.lapses,
      state: toFSRSState(state.state),
      last_review: state.lastReview ?? undefined,
    };
  }

  private fromCard(card: Card): FSRSState {
    return {
      difficulty: card.difficulty,
      stability: card.stability,
      due: card.due,
      lastReview: card.last_review ?? null,
      reps: card.reps,
      lapses: card.lapses,
      state: fromFSRSState(card.state),
    };
  }

  /**
   * Schedule for a card that was never reviewed. It is due immediately.
   */
  createInitialState(now?: Date): FSRSState {
    return this.fromCard(createEmptyCard(now ?? new Date()));
  }

  /**
   * Computes the schedule after a review graded `rating`.
   * The input state is not modified.
   */
  schedule(currentState: FSRSState, rating: ReviewRating, reviewTime?: Date): FSRSState {
    const now = reviewTime ?? new Date();
    const result = this.fsrs.next(this.toCard(currentState), now, toFSRSRating(rating));
    return this.fromCard(result.card);
  }

  /** A card is due once `asOf` reaches its due date. */
  isDue(state: FSRSState, asOf?: Date): boolean {
    const checkTime = asOf ?? new Date();
    return checkTime.getTime() >= state.due.getTime();
  }

  getConfig(): FSRSSchedulerConfig {
    return { ...this.config };
  }
}
