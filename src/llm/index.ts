/**
 * LLM Module - Barrel Export
 *
 * Production implementations of the tutoring core's language
 * collaborators, built on the Anthropic SDK:
 * - AnthropicClient: completions with typed errors and cancellation
 * - AnthropicModelGateway: the ModelGateway for every prompt kind
 * - GatewaySentimentScorer / GatewayCodeAnalyzer: JSON-validated
 *   collaborators on top of the gateway
 *
 * @example
 * ```typescript
 * import { AnthropicClient, AnthropicModelGateway, GatewaySentimentScorer } from './llm';
 *
 * const gateway = new AnthropicModelGateway(new AnthropicClient({ apiKey }));
 * const scorer = new GatewaySentimentScorer(gateway);
 * const signal = await scorer.score('I still do not get recursion');
 * ```
 */

export { AnthropicClient, type AnthropicClientOptions } from './client';
export { AnthropicModelGateway } from './gateway';
export { GatewaySentimentScorer } from './sentiment-scorer';
export { GatewayCodeAnalyzer } from './code-analyzer';

export type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  LLMErrorType,
  CompletionClient,
  CompletionOptions,
} from './types';

export { LLMError } from './types';

export { buildPrompt, type BuiltPrompt } from './prompts';
