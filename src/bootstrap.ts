/**
 * Composition Root
 *
 * Maps the validated configuration onto the tutoring core and wires its
 * collaborators: the Anthropic-backed gateway, scorer and analyzer, and the
 * SQLite-backed stores. Tests and the CLI pass their own collaborators
 * through `overrides`.
 */

import type { Config } from './config';
import { TutoringOrchestrator, type TutorEvent } from './core/orchestrator';
import {
  GatewayError,
  type CodeAnalyzer,
  type ModelGateway,
  type SentimentScorer,
} from './core/gateway';
import {
  AnthropicClient,
  AnthropicModelGateway,
  GatewayCodeAnalyzer,
  GatewaySentimentScorer,
} from './llm';
import {
  createDatabase,
  SessionHistoryRepository,
  UserRepository,
  type AppDatabase,
} from './storage';

export interface TutorOverrides {
  gateway?: ModelGateway;
  sentimentScorer?: SentimentScorer;
  codeAnalyzer?: CodeAnalyzer;
  db?: AppDatabase;
  now?: () => Date;
}

export interface Tutor {
  orchestrator: TutoringOrchestrator;
  db: AppDatabase;
  userStore: UserRepository;
  sessionStore: SessionHistoryRepository;
}

function logEvent(event: TutorEvent): void {
  switch (event.type) {
    case 'confusion_changed':
      console.log(
        `[Orchestrator] ${event.userId} confusion ${event.data.from} -> ${event.data.to} (${event.data.score.toFixed(2)})`
      );
      break;
    case 'flashcard_evicted':
      console.log(`[Orchestrator] ${event.userId} evicted flashcard ${event.data.flashcardId}`);
      break;
    case 'session_restored':
      console.log(
        `[Orchestrator] ${event.userId} restored ${event.data.interactionCount} interaction(s), ${event.data.flashcardCount} flashcard(s)`
      );
      break;
    default:
      break;
  }
}

/**
 * Builds a fully wired orchestrator.
 *
 * @throws LLMError authentication when no gateway is given and no API key is configured
 */
export function createTutor(config: Config, overrides: TutorOverrides = {}): Tutor {
  const db = overrides.db ?? createDatabase(config.database.path);

  const gateway =
    overrides.gateway ??
    new AnthropicModelGateway(
      new AnthropicClient({
        apiKey: config.anthropic.apiKey,
        model: config.anthropic.model,
        maxTokens: config.anthropic.maxTokens,
        timeoutMs: config.anthropic.timeoutMs,
      })
    );

  const userStore = new UserRepository(db);
  const sessionStore = new SessionHistoryRepository(db);

  const orchestrator = new TutoringOrchestrator(
    {
      gateway,
      sentimentScorer: overrides.sentimentScorer ?? new GatewaySentimentScorer(gateway),
      codeAnalyzer: overrides.codeAnalyzer ?? new GatewayCodeAnalyzer(gateway),
      sessionStore,
      userStore,
      now: overrides.now,
    },
    {
      confusion: config.tutoring.confusion,
      flashcards: config.tutoring.flashcards,
    }
  );

  if (config.server.nodeEnv !== 'test') {
    orchestrator.setEventListener(logEvent);
  }

  return { orchestrator, db, userStore, sessionStore };
}

/**
 * Builds an orchestrator for commands that never call the model (export,
 * restore, flashcard listing). Any model call fails with MODEL_UNAVAILABLE.
 */
export function createOfflineTutor(config: Config): Tutor {
  const offline: ModelGateway = {
    generate: async (kind) => {
      throw new GatewayError('unavailable', kind, 'No model configured for offline commands');
    },
  };

  return createTutor(config, { gateway: offline });
}
