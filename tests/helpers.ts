/**
 * Test Helpers Module
 *
 * In-process stand-ins for the tutoring core's collaborators, plus a
 * factory that wires them into an orchestrator. Nothing here touches the
 * network or the file system.
 */

import { z } from 'zod';
import { TutoringOrchestrator } from '../src/core/orchestrator';
import {
  AnalyzerUnavailableError,
  GatewayError,
  ScorerUnavailableError,
  type CallOptions,
  type CodeAnalysisRequest,
  type CodeAnalyzer,
  type ModelGateway,
  type PromptKind,
  type PromptPayloads,
  type SentimentScorer,
  type SessionStore,
  type UserStore,
} from '../src/core/gateway';
import { parseHistorySnapshot, serializeHistory } from '../src/core/ledger';
import type {
  CodeAnalysis,
  CodeError,
  SentimentSignal,
  SessionHistory,
  User,
} from '../src/core/models';
import type { TutoringOrchestratorConfig } from '../src/core/orchestrator';
import type { CompletionClient, CompletionOptions, LLMMessage, LLMResponse } from '../src/llm';

// ============================================================================
// Clock
// ============================================================================

/**
 * A clock that advances one second on every read, starting at `start`.
 */
export function steppingClock(start: Date = new Date('2024-03-01T09:00:00Z')): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}

// ============================================================================
// Model Gateway
// ============================================================================

export interface RecordedCall {
  kind: PromptKind;
  payload: PromptPayloads[PromptKind];
}

/**
 * Gateway with deterministic answers:
 * - learning_explanation: "[<register>] Explanation of: <message>"
 * - hint: "<tier> hint: <description>" plus " (line N)" from the syntax tier on
 */
export class FakeGateway implements ModelGateway {
  calls: RecordedCall[] = [];
  failWith: GatewayError | null = null;
  /** Resolves before answering, so a test can cancel mid-call */
  gate: Promise<void> | null = null;

  async generate<K extends PromptKind>(
    kind: K,
    payload: PromptPayloads[K],
    options: CallOptions = {}
  ): Promise<string> {
    this.calls.push({ kind, payload });
    if (this.gate) {
      await this.gate;
    }
    if (options.signal?.aborted) {
      throw new GatewayError('aborted', kind, 'Request was aborted');
    }
    if (this.failWith) {
      throw this.failWith;
    }
    return this.respond(payload);
  }

  callsOf(kind: PromptKind): RecordedCall[] {
    return this.calls.filter((call) => call.kind === kind);
  }

  private respond(payload: PromptPayloads[PromptKind]): string {
    if ('tier' in payload) {
      const line =
        payload.tier !== 'conceptual' && payload.error.lineNumber !== null
          ? ` (line ${payload.error.lineNumber})`
          : '';
      return `${payload.tier} hint: ${payload.error.description}${line}`;
    }
    if ('register' in payload) {
      return `[${payload.register}] Explanation of: ${payload.message}`;
    }
    return 'unused';
  }
}

/**
 * Completion client that returns a scripted response or throws a scripted error.
 */
export class ScriptedCompletionClient implements CompletionClient {
  requests: Array<{ messages: string | LLMMessage[]; options: CompletionOptions | undefined }> = [];

  constructor(private readonly outcome: LLMResponse | Error) {}

  async complete(messages: string | LLMMessage[], options?: CompletionOptions): Promise<LLMResponse> {
    this.requests.push({ messages, options });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

export function completion(text: string, stopReason: LLMResponse['stopReason'] = 'end_turn'): LLMResponse {
  return { text, usage: { inputTokens: 10, outputTokens: 5 }, stopReason };
}

// ============================================================================
// Analysis Collaborators
// ============================================================================

/**
 * Scorer that answers from a table keyed by message text, neutral otherwise.
 */
export class StubSentimentScorer implements SentimentScorer {
  signals = new Map<string, SentimentSignal>();
  failing = false;
  texts: string[] = [];

  set(text: string, polarity: number, magnitude: number = Math.abs(polarity)): this {
    this.signals.set(text, { polarity, magnitude });
    return this;
  }

  async score(text: string): Promise<SentimentSignal> {
    this.texts.push(text);
    if (this.failing) {
      throw new ScorerUnavailableError('sentiment backend is down');
    }
    return this.signals.get(text) ?? { polarity: 0, magnitude: 0 };
  }
}

/**
 * Analyzer that returns a preset analysis for every submission.
 */
export class StubCodeAnalyzer implements CodeAnalyzer {
  analysis: CodeAnalysis = { findings: [], summary: 'No problems found.' };
  failing = false;
  requests: CodeAnalysisRequest[] = [];

  async analyze(request: CodeAnalysisRequest): Promise<CodeAnalysis> {
    this.requests.push(request);
    if (this.failing) {
      throw new AnalyzerUnavailableError('analysis backend is down');
    }
    return structuredClone(this.analysis);
  }

  respondWith(errors: Array<{ error: CodeError; correction: string }>, summary: string): void {
    this.analysis = { findings: errors, summary };
  }
}

// ============================================================================
// Stores
// ============================================================================

/**
 * Session store that keeps the serialized (JSON) form, so every load goes
 * through the same parsing as the SQLite repository.
 */
export class InMemorySessionStore implements SessionStore {
  /** JSON text per user */
  snapshots = new Map<string, string>();
  failPersist = false;
  persistCount = 0;

  async persist(history: SessionHistory): Promise<void> {
    if (this.failPersist) {
      throw new Error('disk full');
    }
    this.persistCount++;
    this.snapshots.set(history.userId, JSON.stringify(serializeHistory(history)));
  }

  async load(userId: string): Promise<SessionHistory | null> {
    const text = this.snapshots.get(userId);
    if (text === undefined) {
      return null;
    }
    const raw: unknown = JSON.parse(text);
    return parseHistorySnapshot(raw);
  }
}

export class InMemoryUserStore implements UserStore {
  users = new Map<string, User>();

  async findById(userId: string): Promise<User | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async save(user: User): Promise<User> {
    const existing = this.users.get(user.id);
    const saved = { ...user, createdAt: existing?.createdAt ?? user.createdAt };
    this.users.set(user.id, saved);
    return { ...saved };
  }
}

// ============================================================================
// Orchestrator Factory
// ============================================================================

export interface TestTutor {
  orchestrator: TutoringOrchestrator;
  gateway: FakeGateway;
  scorer: StubSentimentScorer;
  analyzer: StubCodeAnalyzer;
  sessionStore: InMemorySessionStore;
  userStore: InMemoryUserStore;
}

export function createTestTutor(config: Partial<TutoringOrchestratorConfig> = {}): TestTutor {
  const gateway = new FakeGateway();
  const scorer = new StubSentimentScorer();
  const analyzer = new StubCodeAnalyzer();
  const sessionStore = new InMemorySessionStore();
  const userStore = new InMemoryUserStore();

  const orchestrator = new TutoringOrchestrator(
    {
      gateway,
      sentimentScorer: scorer,
      codeAnalyzer: analyzer,
      sessionStore,
      userStore,
      now: steppingClock(),
    },
    config
  );

  return { orchestrator, gateway, scorer, analyzer, sessionStore, userStore };
}

// ============================================================================
// Fixtures
// ============================================================================

export const SYNTAX_ERROR: CodeError = {
  errorType: 'syntax',
  lineNumber: 4,
  description: 'Missing colon after if condition',
  severity: 2,
};

export const LOGIC_ERROR: CodeError = {
  errorType: 'logic',
  lineNumber: 10,
  description: 'Loop counter is never incremented',
  severity: 5,
};

/** Ten lines, so line 4 and line 10 both exist. */
export const BUGGY_CODE = [
  'def count_up(limit):',
  '    i = 0',
  '    total = 0',
  '    if limit > 0',
  '        print("counting")',
  '    while i < limit:',
  '        total += i',
  '        print(i)',
  '    print("done")',
  '    return total',
].join('\n');

export const FIXED_CODE = [
  'def count_up(limit):',
  '    total = 0',
  '    for i in range(limit):',
  '        total += i',
  '    return total',
].join('\n');

// ============================================================================
// HTTP
// ============================================================================

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    })
    .optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

/**
 * Reads a response body in the API's `{ success, data | error }` envelope.
 */
export async function getJsonResponse(response: Response): Promise<Envelope> {
  const body: unknown = await response.json();
  return envelopeSchema.parse(body);
}
