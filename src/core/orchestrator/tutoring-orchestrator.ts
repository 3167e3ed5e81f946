/**
 * Tutoring Orchestrator
 *
 * The boundary of the tutoring core. Every exposed operation goes through
 * here; the components behind it (confusion tracker, hint ladder engine,
 * flashcard curator, session ledger) never see a request directly.
 *
 * Handling a message:
 *
 * 1. Validate the request. Nothing is touched before this passes.
 * 2. Hydrate the user's history from the session store on first touch.
 * 3. Score sentiment and assess confusion.
 * 4. Branch on the user's mode:
 *    - learning: ask the model for an explanation, in a simplified register
 *      when confusion is high
 *    - debugging: analyze the code, then prepare a hint ladder for the most
 *      severe error (kept when the same code is resubmitted)
 * 5. Commit: apply the confusion update, install the ladder, curate one
 *    flashcard per finding, append exactly one interaction, persist.
 *
 * Concurrency: each user has a lock (KeyedLock). It is held only while local
 * state is read or changed; model, scorer and analyzer calls run outside it,
 * and step 5 runs as a single critical section. Users never wait on each
 * other. Since scoring finishes before the commit takes the lock, two
 * messages from one user in flight at once are each assessed against the
 * window as it stood before either; neither counts the other as a
 * repetition. Their commits still apply one after the other.
 *
 * Debugging session ids are chosen by the caller. A session whose ladder
 * belongs to another user is NOT_FOUND, checked again inside the commit.
 *
 * Cancellation: the request's AbortSignal is checked after every external
 * call and at the start of the commit. A cancelled request applies nothing
 * and fails with CANCELLED.
 *
 * A commit whose persist fails is undone in memory (ledger, confusion
 * window, hint ladder) before STORE_UNAVAILABLE is reported, so a retry
 * records the message once.
 */

import { randomUUID } from 'crypto';
import type {
  CodeAnalysis,
  ConfusionState,
  Flashcard,
  FlashcardFilters,
  HintLadder,
  LearningStyle,
  SentimentSignal,
  SessionHistory,
  TutorMode,
  User,
} from '../models';
import { DEFAULT_LEARNING_STYLE, DEFAULT_TUTOR_MODE, orderBySeverity } from '../models';
import {
  TutorError,
  TutorErrorCodes,
  err,
  invalidInput,
  ok,
  toPublicError,
  type PublicError,
  type Result,
  type TutorErrorCode,
  type TutorErrorContext,
} from '../errors';
import {
  AnalyzerUnavailableError,
  GatewayError,
  ScorerUnavailableError,
  type CodeAnalyzer,
  type ModelGateway,
  type PromptKind,
  type PromptPayloads,
  type SentimentScorer,
  type SessionStore,
  type UserStore,
  type GatewayFailureReason,
} from '../gateway';
import { KeyedLock } from '../concurrency';
import { SessionLedger, parseHistorySnapshot } from '../ledger';
import { ConfusionTracker, type ConfusionAssessment, type ConfusionCheckpoint } from '../confusion';
import { HintLadderEngine, fingerprintCode, type PreparedLadder, type RevealedHint } from '../hints';
import { FlashcardCurator } from '../flashcards';
import { FSRSScheduler, REVIEW_RATINGS, type ReviewRating } from '../fsrs';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type HintReveal,
  type HintSessionSummary,
  type TutorDecision,
  type TutorEventInput,
  type TutorEventListener,
  type TutorRequest,
  type TutoringOrchestratorConfig,
  type TutoringOrchestratorDependencies,
} from './types';

/**
 * Generates a unique ID with the given prefix.
 */
function generateId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}

const GATEWAY_ERROR_CODES: Record<GatewayFailureReason, TutorErrorCode> = {
  timeout: TutorErrorCodes.MODEL_TIMEOUT,
  rate_limited: TutorErrorCodes.MODEL_RATE_LIMITED,
  malformed_response: TutorErrorCodes.MODEL_MALFORMED_RESPONSE,
  unavailable: TutorErrorCodes.MODEL_UNAVAILABLE,
  aborted: TutorErrorCodes.CANCELLED,
};

const LEARNING_STYLES: readonly LearningStyle[] = ['ELI5', 'Visual', 'Standard'];
const TUTOR_MODES: readonly TutorMode[] = ['learning', 'debugging'];

/** A request that passed validation. */
interface ValidatedRequest {
  userId: string;
  message: string;
  code: string | null;
  language: string | null;
  sessionId: string | null;
  signal: AbortSignal | undefined;
}

/** Output of the debugging branch, applied during the commit. */
interface DebuggingPlan {
  sessionId: string;
  code: string;
  language: string | null;
  analysis: CodeAnalysis;
  prepared: PreparedLadder | null;
  reused: boolean;
}

/** In-memory state of one user before a commit, for undoing it. */
interface UserCheckpoint {
  userId: string;
  history: SessionHistory;
  confusion: ConfusionCheckpoint;
  sessionId: string | null;
  ladder: HintLadder | null;
  activeSession: string | undefined;
}

function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim().length === 0;
}

/**
 * Where a finding was seen, shown on the flashcard: the language and the
 * offending line when the code has one.
 */
function describeLocation(code: string, language: string | null, lineNumber: number | null): string {
  const label = language && language.trim().length > 0 ? language.trim() : 'code';
  if (lineNumber === null) {
    return label;
  }
  const line = code.split(/\r?\n/)[lineNumber - 1]?.trim() ?? '';
  return line.length > 0 ? `${label} line ${lineNumber}: ${line}` : `${label} line ${lineNumber}`;
}

export class TutoringOrchestrator {
  private readonly gateway: ModelGateway;
  private readonly sentimentScorer: SentimentScorer;
  private readonly codeAnalyzer: CodeAnalyzer;
  private readonly sessionStore: SessionStore;
  private readonly userStore: UserStore;
  private readonly now: () => Date;
  private readonly config: TutoringOrchestratorConfig;

  private readonly locks = new KeyedLock();
  private readonly ledger: SessionLedger;
  private readonly tracker: ConfusionTracker;
  private readonly hintEngine: HintLadderEngine;
  private readonly curator: FlashcardCurator;

  /** Most recent debugging session per user, used when a request names none */
  private activeSessions: Map<string, string> = new Map();

  private eventListener: TutorEventListener | undefined;

  constructor(
    deps: TutoringOrchestratorDependencies,
    config: Partial<TutoringOrchestratorConfig> = {}
  ) {
    this.gateway = deps.gateway;
    this.sentimentScorer = deps.sentimentScorer;
    this.codeAnalyzer = deps.codeAnalyzer;
    this.sessionStore = deps.sessionStore;
    this.userStore = deps.userStore;
    this.now = deps.now ?? (() => new Date());
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };

    this.ledger = new SessionLedger(this.now);
    this.tracker = new ConfusionTracker(this.ledger, this.config.confusion);
    this.hintEngine = new HintLadderEngine(this.gateway, this.now);
    this.curator = new FlashcardCurator(
      this.ledger,
      deps.scheduler ?? new FSRSScheduler(),
      this.config.flashcards
    );
  }

  /**
   * Sets the event listener for orchestrator events.
   *
   * @example
   * ```typescript
   * orchestrator.setEventListener((event) => {
   *   console.log(`[Orchestrator] ${event.type}`, event.data);
   * });
   * ```
   */
  setEventListener(listener: TutorEventListener | undefined): void {
    this.eventListener = listener;
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  /**
   * Handles one learner message in the user's current mode.
   *
   * @throws TutorError INVALID_INPUT, ANALYSIS_UNAVAILABLE, MODEL_*,
   *   STORE_UNAVAILABLE, NOT_FOUND (session owned by someone else) or CANCELLED
   */
  async handleMessage(request: TutorRequest): Promise<TutorDecision> {
    const input = this.validateRequest(request);
    const { userId, signal } = input;
    const context: TutorErrorContext = { operation: 'handleMessage', userId };

    this.throwIfCancelled(signal, context);
    const user = await this.loadUser(userId, context);
    if (user.mode === 'debugging' && input.code === null) {
      throw invalidInput('Code is required in debugging mode', context);
    }
    await this.ensureHydrated(userId, context);

    const sentiment = await this.scoreSentiment(input.message, signal, context);
    this.throwIfCancelled(signal, context);

    const assessment = await this.locks.runExclusive(userId, () =>
      this.tracker.assess(userId, input.message, sentiment, this.now())
    );

    if (user.mode === 'learning') {
      const responseText = await this.explain(input, user, assessment);
      this.throwIfCancelled(signal, context);
      return this.commit(input, user.mode, assessment, responseText, null);
    }

    const plan = await this.planDebugging(input, user, context);
    this.throwIfCancelled(signal, context);
    return this.commit(input, user.mode, assessment, plan.analysis.summary, plan);
  }

  // ==========================================================================
  // Hints
  // ==========================================================================

  /**
   * Reveals the next tier of a debugging session's hint ladder.
   * Returns HINT_EXHAUSTED after the solution, NOT_FOUND for an unknown session.
   */
  async requestNextHint(sessionId: string): Promise<Result<HintReveal>> {
    const ladder = this.hintEngine.get(sessionId);
    if (!ladder) {
      return err(this.sessionNotFound(sessionId, 'requestNextHint'));
    }

    return this.locks.runExclusive(ladder.userId, () =>
      this.toReveal(sessionId, ladder.userId, this.hintEngine.advance(sessionId))
    );
  }

  /**
   * Reveals every tier up to `level`. Requires `allowSkip`; without it the
   * result is SKIP_NOT_ALLOWED.
   */
  async jumpToHint(sessionId: string, level: number, allowSkip: boolean): Promise<Result<HintReveal>> {
    const ladder = this.hintEngine.get(sessionId);
    if (!ladder) {
      return err(this.sessionNotFound(sessionId, 'jumpToHint'));
    }

    return this.locks.runExclusive(ladder.userId, () =>
      this.toReveal(sessionId, ladder.userId, this.hintEngine.jumpTo(sessionId, level, { allowSkip }))
    );
  }

  // ==========================================================================
  // Flashcards
  // ==========================================================================

  /**
   * Lists a user's flashcards, oldest first.
   *
   * @throws TutorError INVALID_INPUT for a non-positive or fractional limit
   */
  async listFlashcards(userId: string, filters: FlashcardFilters = {}): Promise<Flashcard[]> {
    const context: TutorErrorContext = { operation: 'listFlashcards', userId };
    this.requireUserId(userId, context);
    if (filters.limit !== undefined && (!Number.isInteger(filters.limit) || filters.limit < 1)) {
      throw invalidInput('Limit must be a positive integer', context);
    }

    await this.ensureHydrated(userId, context);
    const asOf = this.now();

    const cards = this.ledger.flashcards(userId).filter(
      (card) =>
        (filters.errorType === undefined || card.errorType === filters.errorType) &&
        (!filters.dueOnly || this.curator.isDue(card, asOf)) &&
        (!filters.unreviewedOnly || card.reviewCount === 0)
    );

    return filters.limit === undefined ? cards : cards.slice(0, filters.limit);
  }

  /**
   * Records a flashcard review and reschedules the card.
   *
   * @throws TutorError NOT_FOUND for an unknown card, INVALID_INPUT for an unknown rating
   */
  async reviewFlashcard(userId: string, flashcardId: string, rating: ReviewRating): Promise<Flashcard> {
    const context: TutorErrorContext = { operation: 'reviewFlashcard', userId };
    this.requireUserId(userId, context);
    if (!REVIEW_RATINGS.includes(rating)) {
      throw invalidInput(`Unknown rating '${rating}'`, context);
    }

    await this.ensureHydrated(userId, context);

    return this.locks.runExclusive(userId, () =>
      this.undoOnFailure(this.checkpoint(userId, null), async () => {
        const card = this.curator.review(userId, flashcardId, rating, this.now());
        await this.persist(userId, context);
        return card;
      })
    );
  }

  // ==========================================================================
  // History
  // ==========================================================================

  /**
   * Returns a deep copy of the user's full history.
   */
  async exportSession(userId: string): Promise<SessionHistory> {
    const context: TutorErrorContext = { operation: 'exportSession', userId };
    this.requireUserId(userId, context);
    await this.ensureHydrated(userId, context);
    return this.locks.runExclusive(userId, () => this.ledger.snapshot(userId));
  }

  /**
   * Replaces the user's history with a snapshot (a SessionHistory or its
   * JSON form) and persists it. The confusion window starts over.
   *
   * @throws TutorError MALFORMED_SNAPSHOT, leaving the current history as it was
   */
  async restoreSession(userId: string, snapshot: unknown): Promise<SessionHistory> {
    const context: TutorErrorContext = { operation: 'restoreSession', userId };
    this.requireUserId(userId, context);
    const history = parseHistorySnapshot(snapshot, context);

    return this.locks.runExclusive(userId, async () => {
      await this.undoOnFailure(this.checkpoint(userId, null), async () => {
        this.ledger.restore(userId, history);
        this.tracker.reset(userId);
        await this.persist(userId, context);
      });

      this.emit({
        type: 'session_restored',
        userId,
        data: {
          interactionCount: history.interactions.length,
          flashcardCount: history.flashcards.length,
        },
      });
      return this.ledger.snapshot(userId);
    });
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  /** The user's preferences, or the defaults for a user never seen. */
  async getUser(userId: string): Promise<User> {
    const context: TutorErrorContext = { operation: 'getUser', userId };
    this.requireUserId(userId, context);
    return this.loadUser(userId, context);
  }

  /**
   * Switches the user's mode and records the change in the ledger.
   * Switching to the current mode changes nothing.
   */
  async switchMode(userId: string, mode: TutorMode): Promise<User> {
    const context: TutorErrorContext = { operation: 'switchMode', userId };
    this.requireUserId(userId, context);
    if (!TUTOR_MODES.includes(mode)) {
      throw invalidInput(`Unknown mode '${mode}'`, context);
    }

    await this.ensureHydrated(userId, context);

    return this.locks.runExclusive(userId, async () => {
      const user = await this.loadUser(userId, context);
      if (user.mode === mode) {
        return user;
      }

      const at = this.now();
      const saved = await this.undoOnFailure(this.checkpoint(userId, null), async () => {
        this.ledger.appendModeChange(userId, user.mode, mode, at);
        await this.persist(userId, context);
        return this.saveUser({ ...user, mode, updatedAt: at }, context);
      });

      this.emit({ type: 'mode_changed', userId, data: { from: user.mode, to: mode } });
      return saved;
    });
  }

  async setLearningStyle(userId: string, learningStyle: LearningStyle): Promise<User> {
    const context: TutorErrorContext = { operation: 'setLearningStyle', userId };
    this.requireUserId(userId, context);
    if (!LEARNING_STYLES.includes(learningStyle)) {
      throw invalidInput(`Unknown learning style '${learningStyle}'`, context);
    }

    return this.locks.runExclusive(userId, async () => {
      const user = await this.loadUser(userId, context);
      if (user.learningStyle === learningStyle) {
        return user;
      }

      const saved = await this.saveUser({ ...user, learningStyle, updatedAt: this.now() }, context);
      this.emit({
        type: 'learning_style_changed',
        userId,
        data: { from: user.learningStyle, to: learningStyle },
      });
      return saved;
    });
  }

  /** Latest confusion state, or null before the user's first message. */
  getConfusionState(userId: string): ConfusionState | null {
    return this.tracker.getState(userId);
  }

  // ==========================================================================
  // Branches
  // ==========================================================================

  private async explain(
    input: ValidatedRequest,
    user: User,
    assessment: ConfusionAssessment
  ): Promise<string> {
    const recentExchanges = this.ledger
      .recentInteractions(input.userId, this.config.contextExchanges)
      .map((interaction) => ({ message: interaction.message, response: interaction.response }));

    return this.generate(
      'learning_explanation',
      {
        message: input.message,
        learningStyle: user.learningStyle,
        register: assessment.state.level === 'high' ? 'simplified' : 'standard',
        recentExchanges,
      },
      input.signal,
      { operation: 'handleMessage', userId: input.userId }
    );
  }

  private async planDebugging(
    input: ValidatedRequest,
    user: User,
    context: TutorErrorContext
  ): Promise<DebuggingPlan> {
    const code = input.code ?? '';
    const sessionId = input.sessionId ?? this.activeSessions.get(input.userId) ?? generateId('dbg');
    const sessionContext = { ...context, sessionId };

    this.requireSessionOwner(sessionId, input.userId, 'handleMessage');
    const existing = this.hintEngine.get(sessionId);

    const analysis = await this.analyzeCode(code, input.language, input.signal, sessionContext);
    this.throwIfCancelled(input.signal, sessionContext);

    const errors = analysis.findings.map((finding) => finding.error);
    const reused = existing !== null && existing.codeFingerprint === fingerprintCode(code);

    let prepared: PreparedLadder | null = null;
    if (errors.length > 0 && !reused) {
      prepared = await this.withGatewayErrors(
        () =>
          this.hintEngine.prepare(
            sessionId,
            input.userId,
            errors,
            { code, language: input.language, learningStyle: user.learningStyle },
            { signal: input.signal }
          ),
        input.signal,
        sessionContext
      );
    }

    return { sessionId, code, language: input.language, analysis, prepared, reused };
  }

  /**
   * Applies everything the request produced, under the user's lock.
   */
  private async commit(
    input: ValidatedRequest,
    mode: TutorMode,
    assessment: ConfusionAssessment,
    responseText: string,
    plan: DebuggingPlan | null
  ): Promise<TutorDecision> {
    const { userId } = input;
    const context: TutorErrorContext = { operation: 'handleMessage', userId };

    return this.locks.runExclusive(userId, async () => {
      this.throwIfCancelled(input.signal, context);
      if (plan) {
        this.requireSessionOwner(plan.sessionId, userId, 'handleMessage');
      }

      const events: TutorEventInput[] = [];
      const checkpoint = this.checkpoint(userId, plan?.sessionId ?? null);
      const decision = await this.undoOnFailure(checkpoint, async () => {
        const applied = this.apply(input, mode, assessment, responseText, plan, events);
        await this.persist(userId, context);
        return applied;
      });

      events.forEach((event) => this.emit(event));
      return decision;
    });
  }

  /**
   * Applies the confusion update, the ladder, the flashcards and the
   * interaction to in-memory state. Runs under the user's lock.
   */
  private apply(
    input: ValidatedRequest,
    mode: TutorMode,
    assessment: ConfusionAssessment,
    responseText: string,
    plan: DebuggingPlan | null,
    events: TutorEventInput[]
  ): TutorDecision {
    const { userId } = input;
    const at = this.now();

    const confusion = this.tracker.commit(assessment);
    if (confusion.transition) {
      const { from, to, score } = confusion.transition;
      events.push({ type: 'confusion_changed', userId, data: { from, to, score } });
    }

    const flashcards: Flashcard[] = [];
    const warnings: PublicError[] = [];
    let hintSession: HintSessionSummary | null = null;

    if (plan) {
      hintSession = this.applyLadder(plan, userId, events);

      const findings = orderBySeverity(plan.analysis.findings, (finding) => finding.error);
      for (const finding of findings) {
        const result = this.curator.curate(
          userId,
          finding.error,
          finding.correction,
          describeLocation(plan.code, plan.language, finding.error.lineNumber),
          at
        );
        if (result.flashcard) {
          flashcards.push(result.flashcard);
          events.push({
            type: 'flashcard_created',
            userId,
            data: { flashcardId: result.flashcard.id, signature: result.flashcard.signature },
          });
        }
        for (const evicted of result.evicted) {
          events.push({ type: 'flashcard_evicted', userId, data: { flashcardId: evicted.id } });
        }
        warnings.push(...result.warnings.map(toPublicError));
      }
    }

    const interaction = this.ledger.append({
      userId,
      mode,
      message: input.message,
      code: input.code,
      response: responseText,
      confusionLevel: confusion.state.level,
      flashcardGenerated: flashcards.length > 0,
      timestamp: at,
    });
    events.push({
      type: 'interaction_recorded',
      userId,
      data: { interactionId: interaction.id, mode, sequence: interaction.sequence },
    });

    return {
      interactionId: interaction.id,
      mode,
      responseText,
      confusionLevel: confusion.state.level,
      confusionScore: confusion.state.score,
      badgeColor: confusion.state.badgeColor,
      flashcardGenerated: flashcards.length > 0,
      flashcards,
      hintSession,
      warnings,
    };
  }

  /**
   * Installs, keeps or discards the session's ladder per the plan.
   */
  private applyLadder(
    plan: DebuggingPlan,
    userId: string,
    events: TutorEventInput[]
  ): HintSessionSummary | null {
    const { sessionId } = plan;
    this.activeSessions.set(userId, sessionId);

    if (plan.prepared) {
      // Newer code wins over a ladder installed while this one was prepared
      this.hintEngine.reset(sessionId);
      const installed = this.hintEngine.install(plan.prepared);
      if (!installed.ok) {
        throw installed.error;
      }
      events.push({
        type: 'hint_ladder_created',
        userId,
        data: { sessionId, subject: installed.value.subject },
      });
    } else if (!plan.reused) {
      // The new code has no errors; the old ladder no longer applies
      this.hintEngine.reset(sessionId);
    }

    const ladder = this.hintEngine.get(sessionId);
    if (!ladder) {
      return null;
    }
    return {
      sessionId,
      subject: ladder.subject,
      stage: ladder.stage,
      currentLevel: ladder.currentLevel,
      reused: plan.reused && plan.prepared === null,
    };
  }

  /** NOT_FOUND when the session's ladder belongs to another user. */
  private requireSessionOwner(sessionId: string, userId: string, operation: string): void {
    const ladder = this.hintEngine.get(sessionId);
    if (ladder && ladder.userId !== userId) {
      throw this.sessionNotFound(sessionId, operation);
    }
  }

  private toReveal(sessionId: string, userId: string, result: Result<RevealedHint>): Result<HintReveal> {
    if (!result.ok) {
      return result;
    }
    const { tier, content, level, hasNext } = result.value;
    this.emit({ type: 'hint_revealed', userId, data: { sessionId, tier, level } });
    return ok({ sessionId, tier, content, level, hasNext });
  }

  // ==========================================================================
  // Collaborator calls
  // ==========================================================================

  private async scoreSentiment(
    text: string,
    signal: AbortSignal | undefined,
    context: TutorErrorContext
  ): Promise<SentimentSignal> {
    try {
      return await this.sentimentScorer.score(text, { signal });
    } catch (error) {
      this.throwIfCancelled(signal, context);
      const reason = error instanceof ScorerUnavailableError ? error.message : 'Sentiment scoring failed';
      throw new TutorError(
        TutorErrorCodes.ANALYSIS_UNAVAILABLE,
        `Could not score the message: ${reason}`,
        context,
        error
      );
    }
  }

  private async analyzeCode(
    code: string,
    language: string | null,
    signal: AbortSignal | undefined,
    context: TutorErrorContext
  ): Promise<CodeAnalysis> {
    let analysis: CodeAnalysis;
    try {
      analysis = await this.codeAnalyzer.analyze({ code, language }, { signal });
    } catch (error) {
      this.throwIfCancelled(signal, context);
      const reason = error instanceof AnalyzerUnavailableError ? error.message : 'Code analysis failed';
      throw new TutorError(
        TutorErrorCodes.ANALYSIS_UNAVAILABLE,
        `Could not analyze the code: ${reason}`,
        context,
        error
      );
    }

    const unusable = analysis.findings.some(
      (finding) => isBlank(finding.error.description) || isBlank(finding.correction)
    );
    if (unusable || isBlank(analysis.summary)) {
      throw new TutorError(
        TutorErrorCodes.ANALYSIS_UNAVAILABLE,
        'Code analysis returned an incomplete result',
        context
      );
    }
    return analysis;
  }

  private generate<K extends PromptKind>(
    kind: K,
    payload: PromptPayloads[K],
    signal: AbortSignal | undefined,
    context: TutorErrorContext
  ): Promise<string> {
    return this.withGatewayErrors(
      () => this.gateway.generate(kind, payload, { signal }),
      signal,
      context
    );
  }

  /**
   * Runs a gateway-backed call, mapping each gateway failure reason to its
   * own error code.
   */
  private async withGatewayErrors<T>(
    fn: () => Promise<T>,
    signal: AbortSignal | undefined,
    context: TutorErrorContext
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.throwIfCancelled(signal, context);
      if (error instanceof TutorError) {
        throw error.withContext(context);
      }
      if (error instanceof GatewayError) {
        throw new TutorError(
          GATEWAY_ERROR_CODES[error.reason],
          `Model request failed (${error.promptKind}): ${error.message}`,
          context,
          error
        );
      }
      throw new TutorError(TutorErrorCodes.MODEL_UNAVAILABLE, 'Model request failed', context, error);
    }
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Loads the user's history from the store the first time the user is seen.
   */
  private async ensureHydrated(userId: string, context: TutorErrorContext): Promise<void> {
    if (this.ledger.has(userId)) {
      return;
    }

    let stored: SessionHistory | null;
    try {
      stored = await this.sessionStore.load(userId);
    } catch (error) {
      console.error(`[Orchestrator] Failed to load history for ${userId}:`, error);
      throw new TutorError(TutorErrorCodes.STORE_UNAVAILABLE, 'Session history could not be loaded', context, error);
    }

    await this.locks.runExclusive(userId, () => {
      if (this.ledger.has(userId)) {
        return;
      }
      if (stored) {
        this.ledger.restore(userId, stored);
      } else {
        this.ledger.open(userId, this.now());
      }
    });
  }

  /**
   * Writes the user's whole history.
   */
  private async persist(userId: string, context: TutorErrorContext): Promise<void> {
    try {
      await this.sessionStore.persist(this.ledger.snapshot(userId));
    } catch (error) {
      console.error(`[Orchestrator] Failed to persist history for ${userId}:`, error);
      throw new TutorError(TutorErrorCodes.STORE_UNAVAILABLE, 'Session history could not be saved', context, error);
    }
  }

  private checkpoint(userId: string, sessionId: string | null): UserCheckpoint {
    return {
      userId,
      history: this.ledger.snapshot(userId),
      confusion: this.tracker.checkpoint(userId),
      sessionId,
      ladder: sessionId === null ? null : this.hintEngine.get(sessionId),
      activeSession: this.activeSessions.get(userId),
    };
  }

  private rollback(checkpoint: UserCheckpoint): void {
    const { userId, sessionId, activeSession } = checkpoint;
    this.ledger.restore(userId, checkpoint.history);
    this.tracker.rollback(checkpoint.confusion);
    if (sessionId !== null) {
      this.hintEngine.restore(sessionId, checkpoint.ladder);
    }
    if (activeSession === undefined) {
      this.activeSessions.delete(userId);
    } else {
      this.activeSessions.set(userId, activeSession);
    }
  }

  /**
   * Runs `fn`, putting the user's in-memory state back to `checkpoint` if
   * it throws.
   */
  private async undoOnFailure<T>(checkpoint: UserCheckpoint, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.rollback(checkpoint);
      throw error;
    }
  }

  private async loadUser(userId: string, context: TutorErrorContext): Promise<User> {
    let user: User | null;
    try {
      user = await this.userStore.findById(userId);
    } catch (error) {
      throw new TutorError(TutorErrorCodes.STORE_UNAVAILABLE, 'User could not be loaded', context, error);
    }
    if (user) {
      return user;
    }

    const now = this.now();
    return {
      id: userId,
      learningStyle: DEFAULT_LEARNING_STYLE,
      mode: DEFAULT_TUTOR_MODE,
      createdAt: now,
      updatedAt: now,
    };
  }

  private async saveUser(user: User, context: TutorErrorContext): Promise<User> {
    try {
      return await this.userStore.save(user);
    } catch (error) {
      throw new TutorError(TutorErrorCodes.STORE_UNAVAILABLE, 'User could not be saved', context, error);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private validateRequest(request: TutorRequest): ValidatedRequest {
    const context: TutorErrorContext = { operation: 'handleMessage', userId: request.userId };
    this.requireUserId(request.userId, context);

    if (isBlank(request.message)) {
      throw invalidInput('Message must not be empty', context);
    }
    if (request.code !== undefined && request.code !== null && request.code.trim().length === 0) {
      throw invalidInput('Code must not be empty when provided', context);
    }
    if (request.sessionId !== undefined && request.sessionId.trim().length === 0) {
      throw invalidInput('Session id must not be empty when provided', context);
    }

    return {
      userId: request.userId,
      message: request.message,
      code: request.code ?? null,
      language: isBlank(request.language) ? null : (request.language ?? null),
      sessionId: request.sessionId ?? null,
      signal: request.signal,
    };
  }

  private requireUserId(userId: string, context: TutorErrorContext): void {
    if (userId.trim().length === 0) {
      throw invalidInput('User id must not be empty', context);
    }
  }

  private throwIfCancelled(signal: AbortSignal | undefined, context: TutorErrorContext): void {
    if (signal?.aborted) {
      throw new TutorError(TutorErrorCodes.CANCELLED, 'The request was cancelled', context);
    }
  }

  private sessionNotFound(sessionId: string, operation: string): TutorError {
    return new TutorError(
      TutorErrorCodes.NOT_FOUND,
      `Debugging session '${sessionId}' not found`,
      { operation, sessionId }
    );
  }

  private emit(event: TutorEventInput): void {
    if (this.eventListener) {
      this.eventListener({ ...event, timestamp: this.now() });
    }
  }
}
