/**
 * Hint Ladder Engine Types
 */

import type { CodeError, Hint, HintLevel, LearningStyle } from '../models';

/**
 * What the hint prompts need besides the error itself.
 */
export interface HintContext {
  code: string;
  language: string | null;
  learningStyle: LearningStyle;
}

/**
 * A fully generated ladder that has not been installed yet.
 * Produced by `prepare`, applied by `install`.
 */
export interface PreparedLadder {
  sessionId: string;
  userId: string;
  subject: CodeError;
  hints: [Hint, Hint, Hint];
  codeFingerprint: string;
  createdAt: Date;
}

export interface JumpOptions {
  /** Explicit permission to reveal tiers out of order */
  allowSkip: boolean;
}

/** Result of a reveal, as shown to the learner. */
export interface RevealedHint extends Hint {
  level: HintLevel;
  /** Whether another tier can still be revealed */
  hasNext: boolean;
}
