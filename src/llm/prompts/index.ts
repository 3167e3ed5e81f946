/**
 * LLM Prompts Module
 *
 * One builder per prompt kind the tutoring core can request, and parsers
 * for the kinds that answer in JSON.
 *
 * @example
 * ```typescript
 * import { buildPrompt, parseCodeAnalysisResponse } from '@/llm/prompts';
 *
 * const prompt = buildPrompt('code_analysis', { code, language: 'python' });
 * const response = await client.complete(prompt.messages, { systemPrompt: prompt.system });
 * const analysis = parseCodeAnalysisResponse(response.text);
 * ```
 */

import type { PromptKind, PromptPayloads } from '../../core/gateway';
import type { BuiltPrompt } from './types';
import { buildSentimentPrompt } from './sentiment';
import { buildLearningExplanationPrompt } from './learning-explanation';
import { buildHintPrompt } from './hint';
import { buildCodeAnalysisPrompt } from './code-analysis';

const PROMPT_BUILDERS: { [K in PromptKind]: (payload: PromptPayloads[K]) => BuiltPrompt } = {
  sentiment: buildSentimentPrompt,
  learning_explanation: buildLearningExplanationPrompt,
  hint: buildHintPrompt,
  code_analysis: buildCodeAnalysisPrompt,
};

export function buildPrompt<K extends PromptKind>(kind: K, payload: PromptPayloads[K]): BuiltPrompt {
  const builder: (payload: PromptPayloads[K]) => BuiltPrompt = PROMPT_BUILDERS[kind];
  return builder(payload);
}

export type { BuiltPrompt } from './types';
export { buildSentimentPrompt, parseSentimentResponse } from './sentiment';
export { buildLearningExplanationPrompt } from './learning-explanation';
export { buildHintPrompt } from './hint';
export { buildCodeAnalysisPrompt, parseCodeAnalysisResponse } from './code-analysis';
export { extractJsonFromResponse, parseJsonResponse } from './json';
export { styleGuidance } from './style';
