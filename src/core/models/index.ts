/**
 * Core Domain Models - Barrel Export
 *
 * Pure types (and a few pure helpers) shared by every tutoring component.
 *
 * @example
 * ```typescript
 * import type { Flashcard, HintLadder, SessionHistory } from '@/core/models';
 * ```
 */

export type { LearningStyle, TutorMode, User } from './user';
export { DEFAULT_LEARNING_STYLE, DEFAULT_TUTOR_MODE } from './user';

export type {
  SentimentSignal,
  ConfusionLevel,
  BadgeColor,
  ConfusionState,
  ConfusionTransition,
} from './confusion';
export { badgeColorFor } from './confusion';

export type {
  ErrorType,
  Severity,
  CodeError,
  CodeAnalysisFinding,
  CodeAnalysis,
} from './code-error';
export { compareBySeverity, orderBySeverity } from './code-error';

export type { HintTier, HintStage, HintLevel, Hint, HintLadder } from './hint';
export { HINT_TIERS, STAGE_LEVEL, NEXT_STAGE, stageForLevel } from './hint';

export type {
  FSRSLearningState,
  FSRSState,
  ErrorSignature,
  Flashcard,
  FlashcardFilters,
} from './flashcard';

export type { Interaction, ModeChange, SessionHistory } from './session-history';
export { createEmptyHistory } from './session-history';
