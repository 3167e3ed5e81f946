/**
 * Gateway-backed Sentiment Scorer
 *
 * Scores a learner message by asking the model gateway for the `sentiment`
 * prompt kind and validating the JSON it returns.
 */

import {
  ScorerUnavailableError,
  type CallOptions,
  type ModelGateway,
  type SentimentScorer,
} from '../core/gateway';
import type { SentimentSignal } from '../core/models';
import { parseSentimentResponse } from './prompts';

export class GatewaySentimentScorer implements SentimentScorer {
  constructor(private readonly gateway: ModelGateway) {}

  /**
   * @throws ScorerUnavailableError when the gateway fails or answers with
   *   something that is not a valid signal
   */
  async score(text: string, options: CallOptions = {}): Promise<SentimentSignal> {
    try {
      const response = await this.gateway.generate('sentiment', { text }, options);
      return parseSentimentResponse(response);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unknown error';
      throw new ScorerUnavailableError(`Sentiment scoring failed: ${reason}`, error);
    }
  }
}
