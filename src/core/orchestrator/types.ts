/**
 * Tutoring Orchestrator Types
 *
 * Requests, decisions, events and dependencies of the TutoringOrchestrator.
 */

import type {
  BadgeColor,
  CodeError,
  ConfusionLevel,
  Flashcard,
  HintLevel,
  HintStage,
  HintTier,
  LearningStyle,
  TutorMode,
} from '../models';
import type { PublicError } from '../errors';
import type {
  CodeAnalyzer,
  ModelGateway,
  SentimentScorer,
  SessionStore,
  UserStore,
} from '../gateway';
import type { ConfusionConfig } from '../confusion';
import type { FlashcardCuratorConfig } from '../flashcards';
import type { FSRSScheduler } from '../fsrs';

/**
 * One inbound learner message.
 */
export interface TutorRequest {
  userId: string;
  message: string;
  /** Required in debugging mode */
  code?: string | null;
  /** Language of `code`, passed through to analysis and hints */
  language?: string | null;
  /**
   * Debugging session to attach to. Defaults to the user's active debugging
   * session, or a new one.
   */
  sessionId?: string;
  /** Cancels the request; nothing is applied once it fires */
  signal?: AbortSignal;
}

/** Hint ladder summary returned with a debugging decision. */
export interface HintSessionSummary {
  sessionId: string;
  subject: CodeError;
  stage: HintStage;
  currentLevel: HintLevel;
  /** True when resubmitted code kept the existing ladder */
  reused: boolean;
}

/**
 * Result of handling one message.
 */
export interface TutorDecision {
  interactionId: string;
  mode: TutorMode;
  responseText: string;
  confusionLevel: ConfusionLevel;
  confusionScore: number;
  badgeColor: BadgeColor;
  flashcardGenerated: boolean;
  /** Cards created by this message */
  flashcards: Flashcard[];
  hintSession: HintSessionSummary | null;
  /** Non-fatal problems, e.g. FLASHCARD_LIMIT_REACHED */
  warnings: PublicError[];
}

/** A hint revealed through `requestNextHint` or `jumpToHint`. */
export interface HintReveal {
  sessionId: string;
  tier: HintTier;
  content: string;
  level: HintLevel;
  hasNext: boolean;
}

// ============================================================================
// Events
// ============================================================================

/**
 * Payload of each orchestrator event.
 * Consumed by logging and by any future push channel to the UI.
 */
export interface TutorEventData {
  interaction_recorded: { interactionId: string; mode: TutorMode; sequence: number };
  confusion_changed: { from: ConfusionLevel; to: ConfusionLevel; score: number };
  hint_ladder_created: { sessionId: string; subject: CodeError };
  hint_revealed: { sessionId: string; tier: HintTier; level: HintLevel };
  flashcard_created: { flashcardId: string; signature: string };
  flashcard_evicted: { flashcardId: string };
  mode_changed: { from: TutorMode; to: TutorMode };
  learning_style_changed: { from: LearningStyle; to: LearningStyle };
  session_restored: { interactionCount: number; flashcardCount: number };
}

export type TutorEventType = keyof TutorEventData;

/** An event before it is stamped with its emission time. */
export type TutorEventInput = {
  [K in TutorEventType]: {
    type: K;
    userId: string;
    data: TutorEventData[K];
  };
}[TutorEventType];

export type TutorEvent = TutorEventInput & { timestamp: Date };

export type TutorEventListener = (event: TutorEvent) => void;

// ============================================================================
// Configuration and Dependencies
// ============================================================================

export interface TutoringOrchestratorConfig {
  confusion: Partial<ConfusionConfig>;
  flashcards: Partial<FlashcardCuratorConfig>;
  /** Previous exchanges sent along with a learning explanation request */
  contextExchanges: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: TutoringOrchestratorConfig = {
  confusion: {},
  flashcards: {},
  contextExchanges: 3,
};

/**
 * Collaborators injected into the TutoringOrchestrator.
 *
 * Everything that talks to the outside world is behind one of these, so
 * tests can substitute in-process fakes.
 */
export interface TutoringOrchestratorDependencies {
  /** Text generation for explanations and hints */
  gateway: ModelGateway;
  sentimentScorer: SentimentScorer;
  codeAnalyzer: CodeAnalyzer;
  /** Persists whole session histories */
  sessionStore: SessionStore;
  /** Persists learning style and mode */
  userStore: UserStore;
  /** Flashcard review scheduling (defaults to a standard FSRSScheduler) */
  scheduler?: FSRSScheduler;
  /** Clock (defaults to the system clock) */
  now?: () => Date;
}
