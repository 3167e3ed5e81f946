/**
 * Collaborator Contracts
 *
 * The tutoring core delegates all language work to collaborators behind
 * these narrow interfaces:
 *
 * - {@link ModelGateway}: text generation for every prompt kind
 * - {@link SentimentScorer}: polarity/magnitude of a learner message
 * - {@link CodeAnalyzer}: errors found in a code submission
 * - {@link SessionStore} and {@link UserStore}: persistence
 *
 * The core decides *which* prompt kind and hint tier to request; the
 * content of the prompts belongs to the implementations (see src/llm).
 */

import type {
  CodeAnalysis,
  CodeError,
  HintTier,
  LearningStyle,
  SentimentSignal,
  SessionHistory,
  User,
} from '../models';

// ============================================================================
// Model Gateway
// ============================================================================

/** Register requested for a learning explanation. */
export type ExplanationRegister = 'standard' | 'simplified';

/** A previous exchange included for conversational context. */
export interface PriorExchange {
  message: string;
  response: string;
}

/**
 * Payload for each prompt kind the core can request.
 */
export interface PromptPayloads {
  sentiment: {
    text: string;
  };
  learning_explanation: {
    message: string;
    learningStyle: LearningStyle;
    register: ExplanationRegister;
    recentExchanges: PriorExchange[];
  };
  hint: {
    tier: HintTier;
    error: CodeError;
    code: string;
    language: string | null;
    learningStyle: LearningStyle;
  };
  code_analysis: {
    code: string;
    language: string | null;
  };
}

export type PromptKind = keyof PromptPayloads;

/** Per-call options for collaborator requests. */
export interface CallOptions {
  /** Aborts the request when the caller cancels */
  signal?: AbortSignal;
}

/**
 * Failure modes of the model gateway. Each one is distinct and reaches the
 * caller as its own error code.
 */
export type GatewayFailureReason =
  | 'timeout'
  | 'rate_limited'
  | 'malformed_response'
  | 'unavailable'
  | 'aborted';

export class GatewayError extends Error {
  public readonly reason: GatewayFailureReason;
  public readonly promptKind: PromptKind;

  constructor(reason: GatewayFailureReason, promptKind: PromptKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'GatewayError';
    this.reason = reason;
    this.promptKind = promptKind;
  }
}

/**
 * Text generation for the tutoring core.
 * Implementations perform no retries the core can observe; retry and
 * backoff policy live inside the gateway.
 */
export interface ModelGateway {
  /**
   * Generates text for a prompt kind.
   *
   * @throws GatewayError on any failure
   */
  generate<K extends PromptKind>(
    kind: K,
    payload: PromptPayloads[K],
    options?: CallOptions
  ): Promise<string>;
}

// ============================================================================
// Analysis Collaborators
// ============================================================================

/**
 * Raised by a sentiment scorer that cannot produce a signal.
 */
export class ScorerUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ScorerUnavailableError';
  }
}

/**
 * Raised by a code analyzer that cannot produce an analysis.
 */
export class AnalyzerUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AnalyzerUnavailableError';
  }
}

export interface SentimentScorer {
  /** @throws ScorerUnavailableError */
  score(text: string, options?: CallOptions): Promise<SentimentSignal>;
}

export interface CodeAnalysisRequest {
  code: string;
  language: string | null;
}

export interface CodeAnalyzer {
  /** @throws AnalyzerUnavailableError */
  analyze(request: CodeAnalysisRequest, options?: CallOptions): Promise<CodeAnalysis>;
}

// ============================================================================
// Persistence
// ============================================================================

/**
 * The only persistence contract the core needs for history.
 * Snapshots are stored and returned verbatim.
 */
export interface SessionStore {
  persist(history: SessionHistory): Promise<void>;
  /** Returns null for a user with no stored history */
  load(userId: string): Promise<SessionHistory | null>;
}

/**
 * Persistence for learner preferences and mode.
 */
export interface UserStore {
  findById(userId: string): Promise<User | null>;
  save(user: User): Promise<User>;
}
