/**
 * Learning Explanation Prompt
 *
 * Answers a conceptual question in the learner's style. When the confusion
 * tracker reports high confusion the orchestrator asks for the simplified
 * register, which trades completeness for one small, concrete step.
 */

import type { ExplanationRegister, PromptPayloads } from '../../core/gateway';
import type { LLMMessage } from '../types';
import type { BuiltPrompt } from './types';
import { styleGuidance } from './style';

const REGISTER_GUIDANCE: Record<ExplanationRegister, string> = {
  standard: 'Give a complete but focused explanation, with a short example where it helps.',
  simplified:
    'The learner is struggling. Slow down: use shorter sentences, cover only the single most important idea, and end with one small thing they can try.',
};

export function buildLearningExplanationPrompt(
  payload: PromptPayloads['learning_explanation']
): BuiltPrompt {
  const system = [
    'You are a patient programming tutor answering a learner\'s conceptual question.',
    styleGuidance(payload.learningStyle),
    REGISTER_GUIDANCE[payload.register],
    'Never invent APIs. If the question is ambiguous, answer the most likely reading and say which one you chose.',
  ].join('\n\n');

  const history: LLMMessage[] = payload.recentExchanges.flatMap((exchange): LLMMessage[] => [
    { role: 'user', content: exchange.message },
    { role: 'assistant', content: exchange.response },
  ]);

  return {
    system,
    messages: [...history, { role: 'user', content: payload.message }],
  };
}
