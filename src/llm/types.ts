/**
 * LLM Types and Interfaces
 *
 * A thin abstraction over the Anthropic SDK types. The tutoring core never
 * sees these; it talks to the ModelGateway, which is built on top of them.
 */

/**
 * A single message in a conversation.
 * Messages alternate between 'user' and 'assistant' roles.
 */
export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Generation settings. All fields are optional and fall back to the
 * client's defaults.
 */
export interface LLMConfig {
  model?: string;
  maxTokens?: number;
  /** 0.0 (deterministic) to 1.0 (creative) */
  temperature?: number;
}

/**
 * Per-call options for a completion.
 *
 * The system prompt is passed per call rather than stored on the client, so
 * concurrent requests with different prompts cannot interfere.
 */
export interface CompletionOptions extends LLMConfig {
  systemPrompt?: string;
  /** Aborts the HTTP request */
  signal?: AbortSignal;
}

/**
 * Result of a completion call.
 */
export interface LLMResponse {
  text: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use' | null;
}

/**
 * Anything that can run a completion. AnthropicClient is the production
 * implementation; tests substitute a scripted one.
 */
export interface CompletionClient {
  complete(messages: string | LLMMessage[], options?: CompletionOptions): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling the LLM API.
 */
export type LLMErrorType =
  | 'authentication'      // Invalid or missing API key
  | 'rate_limit'          // Too many requests
  | 'invalid_request'     // Bad request parameters
  | 'server_error'        // Anthropic server error
  | 'network'             // Network/connection error
  | 'timeout'             // Request took too long
  | 'malformed_response'  // Response could not be used
  | 'aborted'             // Caller cancelled the request
  | 'unknown';            // Unexpected error

/**
 * Custom error class for LLM-related errors.
 */
export class LLMError extends Error {
  type: LLMErrorType;

  constructor(message: string, type: LLMErrorType, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LLMError';
    this.type = type;
  }
}
