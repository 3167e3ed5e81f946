/**
 * Hint Ladder Domain Types
 *
 * A hint ladder is the three-tier disclosure structure attached to one
 * debugging session. Tiers are revealed strictly in order:
 *
 * ```
 * empty -> conceptual_revealed -> syntax_revealed -> solution_revealed
 * ```
 *
 * The stage is a tagged value with an explicit transition table, so that a
 * skipped or repeated step cannot be expressed by accident.
 */

import type { CodeError } from './code-error';

/** The three tiers, in disclosure order. */
export const HINT_TIERS = ['conceptual', 'syntax', 'solution'] as const;

export type HintTier = (typeof HINT_TIERS)[number];

/** Stage of a ladder. The last stage is terminal. */
export type HintStage =
  | 'empty'
  | 'conceptual_revealed'
  | 'syntax_revealed'
  | 'solution_revealed';

/** Number of revealed tiers. 0 means nothing revealed yet. */
export type HintLevel = 0 | 1 | 2 | 3;

/** Level reached in each stage. */
export const STAGE_LEVEL: Record<HintStage, HintLevel> = {
  empty: 0,
  conceptual_revealed: 1,
  syntax_revealed: 2,
  solution_revealed: 3,
};

/** Single-step transition table; null marks the terminal stage. */
export const NEXT_STAGE: Record<HintStage, HintStage | null> = {
  empty: 'conceptual_revealed',
  conceptual_revealed: 'syntax_revealed',
  syntax_revealed: 'solution_revealed',
  solution_revealed: null,
};

const LEVEL_STAGE: Record<HintLevel, HintStage> = {
  0: 'empty',
  1: 'conceptual_revealed',
  2: 'syntax_revealed',
  3: 'solution_revealed',
};

export function stageForLevel(level: HintLevel): HintStage {
  return LEVEL_STAGE[level];
}

/** One hint slot on a ladder. */
export interface Hint {
  tier: HintTier;
  content: string;
  /** Flips false -> true once, never back */
  revealed: boolean;
}

/**
 * The ladder for one debugging session.
 */
export interface HintLadder {
  sessionId: string;
  /** Owner of the debugging session */
  userId: string;
  /** The error the hints are about (highest severity of the submission) */
  subject: CodeError;
  stage: HintStage;
  /** Always STAGE_LEVEL[stage] */
  currentLevel: HintLevel;
  /** Hints in tier order: conceptual, syntax, solution */
  hints: [Hint, Hint, Hint];
  /** Fingerprint of the code the ladder was built for */
  codeFingerprint: string;
  createdAt: Date;
}
