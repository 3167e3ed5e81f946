/**
 * Code Analysis Prompt
 *
 * Asks the model to list the errors in a submission as JSON, each with a
 * type, line, severity and correction, plus a short summary for the learner.
 */

import { z } from 'zod';
import type { CodeAnalysis } from '../../core/models';
import type { PromptPayloads } from '../../core/gateway';
import type { BuiltPrompt } from './types';
import { parseJsonResponse } from './json';

const CODE_ANALYSIS_SYSTEM_PROMPT = `You review code written by programming learners and find its errors.

Return ONLY a JSON object:
{
  "summary": "<two or three sentences for the learner>",
  "findings": [
    {
      "errorType": "syntax" | "logic" | "runtime",
      "lineNumber": <1-based line number, or null>,
      "description": "<what is wrong, one sentence>",
      "severity": <1 (cosmetic) to 5 (breaks the program)>,
      "correction": "<how to fix it, one or two sentences>"
    }
  ]
}

Report each distinct problem once. If the code has no errors, return an empty "findings" array and say so in the summary.`;

export function buildCodeAnalysisPrompt(payload: PromptPayloads['code_analysis']): BuiltPrompt {
  const language = payload.language ?? 'unknown language';
  return {
    system: CODE_ANALYSIS_SYSTEM_PROMPT,
    messages: [
      {
        role: 'user',
        content: `Language: ${language}\n\n\`\`\`\n${payload.code}\n\`\`\``,
      },
    ],
    maxTokens: 2048,
    temperature: 0,
  };
}

const text = z.string().trim().min(1);

const findingSchema = z.object({
  errorType: z.enum(['syntax', 'logic', 'runtime']),
  lineNumber: z.number().int().positive().nullable(),
  description: text,
  severity: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]),
  correction: text,
});

const codeAnalysisResponseSchema = z.object({
  summary: text,
  findings: z.array(findingSchema),
});

/**
 * @throws Error when the response does not match the expected JSON shape
 */
export function parseCodeAnalysisResponse(response: string): CodeAnalysis {
  const result = codeAnalysisResponseSchema.safeParse(parseJsonResponse(response));
  if (!result.success) {
    const first = result.error.errors[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new Error(`Invalid code analysis response${where}: ${first?.message ?? 'unknown'}`);
  }

  return {
    summary: result.data.summary,
    findings: result.data.findings.map(({ correction, ...error }) => ({ error, correction })),
  };
}
