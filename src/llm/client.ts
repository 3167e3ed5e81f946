/**
 * Anthropic Client Wrapper
 *
 * This module provides an abstraction layer over the Anthropic SDK.
 * It handles:
 * - API key configuration with clear error messages
 * - Per-call system prompts, settings and cancellation
 * - Error handling with typed errors
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const response = await client.complete('Hello!', { systemPrompt: 'Be brief.' });
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { LLMMessage, LLMConfig, LLMResponse, CompletionClient, CompletionOptions } from './types';
import { LLMError, type LLMErrorType } from './types';

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

const DEFAULT_MAX_TOKENS = 1024;

const DEFAULT_TEMPERATURE = 0.7;

/** Default request timeout in milliseconds */
const DEFAULT_TIMEOUT_MS = 30_000;

export interface AnthropicClientOptions extends LLMConfig {
  apiKey?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Wrapper class for the Anthropic API client.
 */
export class AnthropicClient implements CompletionClient {
  /** The underlying Anthropic SDK client */
  private client: Anthropic;

  /** Default configuration for all requests */
  private defaultConfig: Required<LLMConfig>;

  /**
   * @throws LLMError if no API key is configured
   *
   * @example
   * ```typescript
   * const client = new AnthropicClient({
   *   apiKey: process.env.ANTHROPIC_API_KEY,
   *   model: 'claude-3-5-haiku-20241022',
   *   maxTokens: 2048,
   * });
   * ```
   */
  constructor(options: AnthropicClientOptions = {}) {
    if (!options.apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Get your API key at: https://console.anthropic.com/\n' +
          'Then set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    this.defaultConfig = {
      model: options.model ?? DEFAULT_MODEL,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   *
   * @param messages - Either a single string (treated as user message) or an array of messages
   * @throws LLMError on API errors
   *
   * @example
   * ```typescript
   * const response = await client.complete(
   *   [
   *     { role: 'user', content: 'What is a closure?' },
   *     { role: 'assistant', content: 'A function plus the scope it was defined in.' },
   *     { role: 'user', content: 'Can you show one?' },
   *   ],
   *   { systemPrompt: 'You are a patient programming tutor.', signal }
   * );
   * ```
   */
  async complete(
    messages: string | LLMMessage[],
    options: CompletionOptions = {}
  ): Promise<LLMResponse> {
    const formattedMessages = this.formatMessages(this.normalizeMessages(messages));
    const mergedConfig = this.mergeConfig(options);

    try {
      const response = await this.client.messages.create(
        {
          model: mergedConfig.model,
          max_tokens: mergedConfig.maxTokens,
          temperature: mergedConfig.temperature,
          system: options.systemPrompt,
          messages: formattedMessages,
        },
        { signal: options.signal }
      );

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private normalizeMessages(input: string | LLMMessage[]): LLMMessage[] {
    if (typeof input === 'string') {
      return [{ role: 'user', content: input }];
    }
    return input;
  }

  private formatMessages(messages: LLMMessage[]): Anthropic.Messages.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private mergeConfig(config: LLMConfig): Required<LLMConfig> {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
    };
  }

  /**
   * Concatenates the text of all text blocks in a response.
   */
  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an API error to a typed LLMError.
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof APIUserAbortError) {
      return new LLMError('Request to Anthropic API was cancelled.', 'aborted', error);
    }

    // Timeout must be checked before APIConnectionError since it extends it
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError('Request to Anthropic API timed out. Please try again.', 'timeout', error);
    }

    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error);
  }

  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
