/**
 * Flashcard Review Ratings
 *
 * Learners grade a flashcard review with one of four string ratings. This
 * module maps them, and the stored learning state, to the numeric enums
 * ts-fsrs works with.
 */

import { Rating, State, type Grade } from 'ts-fsrs';
import type { FSRSLearningState } from '../models';

/**
 * Learner's grade for a flashcard review.
 *
 * - 'again': could not remember the fix (Rating.Again)
 * - 'hard': remembered with real effort (Rating.Hard)
 * - 'good': remembered (Rating.Good)
 * - 'easy': remembered instantly (Rating.Easy)
 */
export type ReviewRating = 'again' | 'hard' | 'good' | 'easy';

export const REVIEW_RATINGS: readonly ReviewRating[] = ['again', 'hard', 'good', 'easy'];

export function toFSRSRating(rating: ReviewRating): Grade {
  const ratingMap: Record<ReviewRating, Grade> = {
    again: Rating.Again,
    hard: Rating.Hard,
    good: Rating.Good,
    easy: Rating.Easy,
  };
  return ratingMap[rating];
}

/**
 * Maps the stored learning state to the ts-fsrs State enum.
 * Stored states are lowercase strings so snapshots stay readable.
 */
export function toFSRSState(state: FSRSLearningState): State {
  const stateMap: Record<FSRSLearningState, State> = {
    new: State.New,
    learning: State.Learning,
    review: State.Review,
    relearning: State.Relearning,
  };
  return stateMap[state];
}

export function fromFSRSState(state: State): FSRSLearningState {
  const stateMap: Record<State, FSRSLearningState> = {
    [State.New]: 'new',
    [State.Learning]: 'learning',
    [State.Review]: 'review',
    [State.Relearning]: 'relearning',
  };
  return stateMap[state];
}
