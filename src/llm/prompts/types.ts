import type { LLMMessage } from '../types';

/**
 * A prompt ready to send: system prompt, conversation and per-kind settings.
 */
export interface BuiltPrompt {
  system: string;
  messages: LLMMessage[];
  maxTokens?: number;
  temperature?: number;
}
