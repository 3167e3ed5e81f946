/**
 * Confusion Tracker Types
 */

import type { ConfusionState, ConfusionTransition } from '../models';

/**
 * Blend weights and level thresholds for the confusion score.
 *
 * score = clamp(0, 1, max(0, -polarity) * negativeWeight + repetition * repetitionWeight)
 *
 * Levels: [0, mediumThreshold) low, [mediumThreshold, highThreshold) medium,
 * [highThreshold, 1] high.
 */
export interface ConfusionConfig {
  /** Number of previous messages compared against for repetition */
  windowSize: number;
  negativeWeight: number;
  repetitionWeight: number;
  mediumThreshold: number;
  highThreshold: number;
}

export const DEFAULT_CONFUSION_CONFIG: ConfusionConfig = {
  windowSize: 5,
  negativeWeight: 0.6,
  repetitionWeight: 0.4,
  mediumThreshold: 0.3,
  highThreshold: 0.6,
};

/**
 * A computed but not yet applied confusion update.
 * Produced by `assess`, applied by `commit`.
 */
export interface ConfusionAssessment {
  userId: string;
  /** Token set of the assessed message, pushed into the window on commit */
  tokens: ReadonlySet<string>;
  /** max(0, -polarity) */
  negativity: number;
  /** Highest similarity with a message in the window, in [0, 1] */
  repetition: number;
  state: ConfusionState;
}

export interface ConfusionCommit {
  state: ConfusionState;
  /** The recorded level change, or null when the level did not change */
  transition: ConfusionTransition | null;
}

/**
 * A learner's window and state at one point, for undoing a commit.
 */
export interface ConfusionCheckpoint {
  userId: string;
  window: ReadonlyArray<ReadonlySet<string>>;
  state: ConfusionState | null;
}

export type ConfusionTransitionListener = (transition: ConfusionTransition) => void;
