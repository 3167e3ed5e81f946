/**
 * Confusion Domain Types
 *
 * Confusion is a blended heuristic over message sentiment and repetition.
 * The discrete level drives both the explanation register and a
 * traffic-light badge in the UI.
 */

/**
 * Normalized output of the external sentiment scorer.
 * The tutor never computes sentiment itself.
 */
export interface SentimentSignal {
  /** Negative to positive, in [-1, 1] */
  polarity: number;
  /** Strength of the sentiment, in [0, 1] */
  magnitude: number;
}

/** Discrete classification of a learner's apparent difficulty. */
export type ConfusionLevel = 'low' | 'medium' | 'high';

/** Presentation color for the confusion badge. */
export type BadgeColor = 'green' | 'yellow' | 'red';

const BADGE_COLORS: Record<ConfusionLevel, BadgeColor> = {
  low: 'green',
  medium: 'yellow',
  high: 'red',
};

/**
 * Maps a confusion level to its badge color.
 * The badge is never set independently of the level.
 */
export function badgeColorFor(level: ConfusionLevel): BadgeColor {
  return BADGE_COLORS[level];
}

/**
 * Current confusion state for one learner, recomputed on every message.
 */
export interface ConfusionState {
  userId: string;
  level: ConfusionLevel;
  /** Blended score in [0, 1] */
  score: number;
  badgeColor: BadgeColor;
  updatedAt: Date;
}

/**
 * A change of confusion level, recorded in the learner's ledger.
 * Consecutive duplicates are never recorded.
 */
export interface ConfusionTransition {
  userId: string;
  from: ConfusionLevel;
  to: ConfusionLevel;
  /** Score that produced the new level */
  score: number;
  at: Date;
}
