/**
 * Flashcards Command
 *
 * Lists a learner's flashcards, oldest first.
 *
 * Usage:
 * ```bash
 * npm run cli -- flashcards user_42 --due --type logic
 * ```
 */

import type { TutoringOrchestrator } from '@/core/orchestrator';
import type { ErrorType } from '@/core/models';
import { invalidInput } from '@/core/errors';
import { bold, dim, formatFlashcard, formatSeparator, printBlankLine } from '../utils/terminal';

const ERROR_TYPES: readonly ErrorType[] = ['syntax', 'logic', 'runtime'];

export interface FlashcardsOptions {
  due?: boolean;
  type?: string;
  limit?: string;
}

function parseErrorType(value: string | undefined): ErrorType | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = ERROR_TYPES.find((type) => type === value);
  if (!match) {
    throw invalidInput(`--type must be one of ${ERROR_TYPES.join(', ')}`, { operation: 'flashcards' });
  }
  return match;
}

export async function runFlashcardsCommand(
  orchestrator: TutoringOrchestrator,
  userId: string,
  options: FlashcardsOptions
): Promise<void> {
  const cards = await orchestrator.listFlashcards(userId, {
    errorType: parseErrorType(options.type),
    dueOnly: options.due ?? false,
    limit: options.limit === undefined ? undefined : Number(options.limit),
  });

  if (cards.length === 0) {
    console.log(dim('No flashcards match.'));
    return;
  }

  console.log(bold(`${cards.length} flashcard(s) for ${userId}`));
  console.log(formatSeparator());
  for (const card of cards) {
    console.log(formatFlashcard(card));
    printBlankLine();
  }
}
