/**
 * Hint Prompt
 *
 * One prompt per tier of the hint ladder. Each tier gives away more than
 * the one before it:
 *
 * - conceptual: which idea the bug is about, without pointing at the code
 * - syntax: where in the code, and what construct is involved
 * - solution: the corrected code
 */

import type { HintTier } from '../../core/models';
import type { PromptPayloads } from '../../core/gateway';
import type { BuiltPrompt } from './types';
import { styleGuidance } from './style';

const TIER_INSTRUCTIONS: Record<HintTier, string> = {
  conceptual:
    'Give a CONCEPTUAL hint: name the programming idea the bug is about and ask a guiding question. Do not mention line numbers or show code.',
  syntax:
    'Give a SYNTAX hint: point to the line and the construct that is wrong and describe what is off about it. Do not write the fix.',
  solution:
    'Give the SOLUTION: show the corrected code for the affected lines and explain the change in one or two sentences.',
};

export function buildHintPrompt(payload: PromptPayloads['hint']): BuiltPrompt {
  const { error } = payload;
  const location = error.lineNumber === null ? 'no specific line' : `line ${error.lineNumber}`;
  const language = payload.language ?? 'unknown language';

  const system = [
    'You are a programming tutor giving staged hints for a bug the learner is fixing.',
    TIER_INSTRUCTIONS[payload.tier],
    styleGuidance(payload.learningStyle),
    'Keep it under 120 words.',
  ].join('\n\n');

  const user = [
    `Bug (${error.errorType}, severity ${error.severity}, ${location}): ${error.description}`,
    '',
    `Code (${language}):`,
    '```',
    payload.code,
    '```',
  ].join('\n');

  return {
    system,
    messages: [{ role: 'user', content: user }],
    maxTokens: 512,
  };
}
