/**
 * Terminal Formatting Utilities
 *
 * ANSI color helpers and formatters for CLI output.
 */

import type { BadgeColor, ConfusionLevel, Flashcard } from '@/core/models';

// =============================================================================
// ANSI Color Functions
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

const BADGE_PAINT: Record<BadgeColor, (s: string) => string> = {
  green,
  yellow,
  red,
};

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats the tutor's response with a "Tutor:" label in cyan.
 */
export function formatTutorMessage(message: string): string {
  return cyan(`Tutor: ${message}`);
}

/**
 * Formats the confusion badge, e.g. "[confusion: medium 0.42]" in yellow.
 */
export function formatConfusionBadge(level: ConfusionLevel, score: number, color: BadgeColor): string {
  return BADGE_PAINT[color](`[confusion: ${level} ${score.toFixed(2)}]`);
}

/**
 * Formats one flashcard as a short block:
 *
 * ```
 * fc_123  logic  line 4  due 2024-03-02
 *   Q: ...
 *   A: ...
 * ```
 */
export function formatFlashcard(card: Flashcard): string {
  const line = card.lineNumber === null ? 'no line' : `line ${card.lineNumber}`;
  const due = card.fsrs.due.toISOString().slice(0, 10);
  return [
    `${bold(card.id)}  ${yellow(card.errorType)}  ${dim(line)}  ${dim(`due ${due}`)}`,
    `  Q: ${card.front}`,
    `  A: ${card.back}`,
  ].join('\n');
}

/**
 * A dim horizontal line for section breaks.
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

export function printBlankLine(): void {
  console.log();
}

/**
 * Help for the slash commands available inside `chat`.
 */
export function printCommandsHelp(): void {
  console.log(bold('Commands:'));
  console.log(formatCommandHelp('/mode', 'Switch to learning or debugging (e.g. /mode debugging)'));
  console.log(formatCommandHelp('/style', 'Set learning style: ELI5, Visual or Standard'));
  console.log(formatCommandHelp('/code', 'Paste code; end with a line containing only "."'));
  console.log(formatCommandHelp('/hint', 'Reveal the next hint for the current code'));
  console.log(formatCommandHelp('/cards', 'List your flashcards'));
  console.log(formatCommandHelp('/help', 'Show this help'));
  console.log(formatCommandHelp('/quit', 'Leave the chat'));
}
