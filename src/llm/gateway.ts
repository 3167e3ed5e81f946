/**
 * Anthropic Model Gateway
 *
 * The production ModelGateway. Builds the prompt for each kind, runs it
 * through a CompletionClient (normally AnthropicClient) and maps LLM
 * failures onto the gateway's failure reasons:
 *
 * | LLMError type          | GatewayError reason  |
 * |------------------------|----------------------|
 * | timeout                | timeout              |
 * | rate_limit             | rate_limited         |
 * | malformed_response     | malformed_response   |
 * | aborted                | aborted              |
 * | anything else          | unavailable          |
 *
 * An empty completion, or one cut off at the token limit, is a malformed
 * response.
 */

import {
  GatewayError,
  type CallOptions,
  type GatewayFailureReason,
  type ModelGateway,
  type PromptKind,
  type PromptPayloads,
} from '../core/gateway';
import { buildPrompt } from './prompts';
import { LLMError, type CompletionClient, type LLMErrorType, type LLMResponse } from './types';

const FAILURE_REASONS: Partial<Record<LLMErrorType, GatewayFailureReason>> = {
  timeout: 'timeout',
  rate_limit: 'rate_limited',
  malformed_response: 'malformed_response',
  aborted: 'aborted',
};

function toGatewayError(kind: PromptKind, error: unknown): GatewayError {
  if (error instanceof LLMError) {
    return new GatewayError(FAILURE_REASONS[error.type] ?? 'unavailable', kind, error.message, error);
  }
  const message = error instanceof Error ? error.message : 'Unknown model failure';
  return new GatewayError('unavailable', kind, message, error);
}

export class AnthropicModelGateway implements ModelGateway {
  constructor(private readonly client: CompletionClient) {}

  async generate<K extends PromptKind>(
    kind: K,
    payload: PromptPayloads[K],
    options: CallOptions = {}
  ): Promise<string> {
    const prompt = buildPrompt(kind, payload);

    let response: LLMResponse;
    try {
      response = await this.client.complete(prompt.messages, {
        systemPrompt: prompt.system,
        maxTokens: prompt.maxTokens,
        temperature: prompt.temperature,
        signal: options.signal,
      });
    } catch (error) {
      throw toGatewayError(kind, error);
    }

    const text = response.text.trim();
    if (text.length === 0) {
      throw new GatewayError('malformed_response', kind, 'Model returned no text');
    }
    if (response.stopReason === 'max_tokens') {
      throw new GatewayError('malformed_response', kind, 'Model response was cut off at the token limit');
    }
    return text;
  }
}
