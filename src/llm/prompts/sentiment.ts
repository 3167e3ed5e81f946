/**
 * Sentiment Prompt
 *
 * Asks the model to rate the emotional tone of a learner's message as a
 * polarity/magnitude pair. The confusion tracker blends the polarity with
 * repetition, so only frustration and confusion need to come out negative.
 */

import { z } from 'zod';
import type { SentimentSignal } from '../../core/models';
import type { PromptPayloads } from '../../core/gateway';
import type { BuiltPrompt } from './types';
import { parseJsonResponse } from './json';

const SENTIMENT_SYSTEM_PROMPT = `You rate the emotional tone of messages that programming learners send to a tutor.

Return ONLY a JSON object:
{"polarity": <number from -1 to 1>, "magnitude": <number from 0 to 1>}

- polarity: -1 is very frustrated, confused or discouraged; 0 is neutral; 1 is very positive.
- magnitude: how strongly the feeling is expressed, regardless of direction.

Do not explain your answer.`;

export function buildSentimentPrompt(payload: PromptPayloads['sentiment']): BuiltPrompt {
  return {
    system: SENTIMENT_SYSTEM_PROMPT,
    messages: [{ role: 'user', content: payload.text }],
    maxTokens: 64,
    temperature: 0,
  };
}

const sentimentResponseSchema = z.object({
  polarity: z.number().min(-1).max(1),
  magnitude: z.number().min(0).max(1),
});

/**
 * @throws Error when the response is not a JSON object with both numbers in range
 */
export function parseSentimentResponse(response: string): SentimentSignal {
  const result = sentimentResponseSchema.safeParse(parseJsonResponse(response));
  if (!result.success) {
    throw new Error(`Invalid sentiment response: ${result.error.errors[0]?.message ?? 'unknown'}`);
  }
  return result.data;
}
