/**
 * Confusion Tracker
 *
 * Scores how confused a learner appears from two signals: negative sentiment
 * of the current message and how closely it repeats one of the learner's
 * recent messages. The blended score maps to a discrete level and a badge
 * color.
 *
 * Level changes are appended to the learner's ledger as transitions. The
 * level a transition starts from is the last one recorded in the ledger; a
 * learner with none is at the `low` baseline, so a first `low` reading is not
 * a transition.
 *
 * Updates are split in two so the orchestrator can apply them all-or-nothing:
 *
 * ```typescript
 * const assessment = tracker.assess(userId, message, sentiment, now); // pure
 * // ... other work that may fail or be cancelled ...
 * tracker.commit(assessment); // mutates the window and the ledger
 * ```
 */

import type { ConfusionLevel, ConfusionState, ConfusionTransition, SentimentSignal } from '../models';
import { badgeColorFor } from '../models';
import { invalidInput } from '../errors';
import type { SessionLedger } from '../ledger';
import { maxSimilarity, tokenize } from './similarity';
import {
  DEFAULT_CONFUSION_CONFIG,
  type ConfusionAssessment,
  type ConfusionCheckpoint,
  type ConfusionCommit,
  type ConfusionConfig,
  type ConfusionTransitionListener,
} from './types';

/** Level assumed for a learner with no recorded transitions. */
const BASELINE_LEVEL: ConfusionLevel = 'low';

function clamp(min: number, max: number, value: number): number {
  return Math.min(max, Math.max(min, value));
}

function isInRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

export class ConfusionTracker {
  private config: ConfusionConfig;

  /** Token sets of each learner's most recent messages, oldest first */
  private windows: Map<string, Array<ReadonlySet<string>>> = new Map();

  private states: Map<string, ConfusionState> = new Map();

  private listener: ConfusionTransitionListener | null = null;

  constructor(
    private readonly ledger: SessionLedger,
    config: Partial<ConfusionConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFUSION_CONFIG, ...config };
  }

  /**
   * Computes the next confusion state without changing anything.
   *
   * @throws TutorError INVALID_INPUT for an empty message or user id, or a
   *   missing, NaN or out-of-range sentiment signal
   */
  assess(
    userId: string,
    messageText: string,
    sentiment: SentimentSignal | null | undefined,
    at: Date
  ): ConfusionAssessment {
    const context = { operation: 'assessConfusion', userId };

    if (userId.trim().length === 0) {
      throw invalidInput('User id must not be empty', context);
    }
    if (messageText.trim().length === 0) {
      throw invalidInput('Message must not be empty', context);
    }
    if (!sentiment) {
      throw invalidInput('Sentiment signal is required', context);
    }
    if (!isInRange(sentiment.polarity, -1, 1)) {
      throw invalidInput(`Sentiment polarity must be in [-1, 1], got ${sentiment.polarity}`, context);
    }
    if (!isInRange(sentiment.magnitude, 0, 1)) {
      throw invalidInput(`Sentiment magnitude must be in [0, 1], got ${sentiment.magnitude}`, context);
    }

    const tokens = tokenize(messageText);
    const repetition = maxSimilarity(tokens, this.windows.get(userId) ?? []);
    const negativity = Math.max(0, -sentiment.polarity);
    const score = clamp(
      0,
      1,
      negativity * this.config.negativeWeight + repetition * this.config.repetitionWeight
    );
    const level = this.levelFor(score);

    return {
      userId,
      tokens,
      negativity,
      repetition,
      state: {
        userId,
        level,
        score,
        badgeColor: badgeColorFor(level),
        updatedAt: at,
      },
    };
  }

  /**
   * Applies an assessment: pushes the message into the window, stores the
   * state and records a transition if the level changed.
   */
  commit(assessment: ConfusionAssessment): ConfusionCommit {
    const { userId, state } = assessment;

    const window = this.windows.get(userId) ?? [];
    window.push(assessment.tokens);
    while (window.length > this.config.windowSize) {
      window.shift();
    }
    this.windows.set(userId, window);
    this.states.set(userId, { ...state });

    const previous = this.ledger.lastConfusionLevel(userId) ?? BASELINE_LEVEL;
    if (previous === state.level) {
      return { state: { ...state }, transition: null };
    }

    const transition: ConfusionTransition = {
      userId,
      from: previous,
      to: state.level,
      score: state.score,
      at: state.updatedAt,
    };
    this.ledger.appendConfusionTransition(transition);
    this.listener?.(transition);

    return { state: { ...state }, transition };
  }

  /**
   * Assesses and commits in one step.
   */
  update(
    userId: string,
    messageText: string,
    sentiment: SentimentSignal | null | undefined,
    at: Date = new Date()
  ): ConfusionState {
    return this.commit(this.assess(userId, messageText, sentiment, at)).state;
  }

  /** Latest state, or null before the learner's first message. */
  getState(userId: string): ConfusionState | null {
    const state = this.states.get(userId);
    return state ? { ...state } : null;
  }

  checkpoint(userId: string): ConfusionCheckpoint {
    return {
      userId,
      window: [...(this.windows.get(userId) ?? [])],
      state: this.getState(userId),
    };
  }

  /**
   * Puts the window and state back as `checkpoint` saw them. Transitions
   * live in the ledger and are rolled back there.
   */
  rollback(checkpoint: ConfusionCheckpoint): void {
    const { userId, window, state } = checkpoint;
    if (window.length > 0) {
      this.windows.set(userId, [...window]);
    } else {
      this.windows.delete(userId);
    }
    if (state) {
      this.states.set(userId, { ...state });
    } else {
      this.states.delete(userId);
    }
  }

  /** Forgets the learner's window and state. Recorded transitions stay. */
  reset(userId: string): void {
    this.windows.delete(userId);
    this.states.delete(userId);
  }

  setTransitionListener(listener: ConfusionTransitionListener | null): void {
    this.listener = listener;
  }

  getConfig(): ConfusionConfig {
    return { ...this.config };
  }

  private levelFor(score: number): ConfusionLevel {
    if (score >= this.config.highThreshold) {
      return 'high';
    }
    if (score >= this.config.mediumThreshold) {
      return 'medium';
    }
    return 'low';
  }
}
