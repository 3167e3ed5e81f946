/**
 * History Commands
 *
 * `export` writes a learner's session history as JSON (to a file or
 * stdout); `restore` replaces a learner's history from such a file.
 *
 * Usage:
 * ```bash
 * npm run cli -- export user_42 -o user_42.json
 * npm run cli -- restore user_42 user_42.json
 * ```
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { TutoringOrchestrator } from '@/core/orchestrator';
import { serializeHistory } from '@/core/ledger';
import { TutorError, TutorErrorCodes } from '@/core/errors';
import { dim, green } from '../utils/terminal';

export interface ExportOptions {
  output?: string;
}

export async function runExportCommand(
  orchestrator: TutoringOrchestrator,
  userId: string,
  options: ExportOptions
): Promise<void> {
  const history = await orchestrator.exportSession(userId);
  const json = JSON.stringify(serializeHistory(history), null, 2);

  if (!options.output) {
    console.log(json);
    return;
  }

  await writeFile(options.output, json + '\n', 'utf-8');
  console.log(
    green(`Exported ${history.interactions.length} interaction(s) and ${history.flashcards.length} flashcard(s)`)
  );
  console.log(dim(`  -> ${options.output}`));
}

export async function runRestoreCommand(
  orchestrator: TutoringOrchestrator,
  userId: string,
  file: string
): Promise<void> {
  const text = await readFile(file, 'utf-8');

  let snapshot: unknown;
  try {
    snapshot = JSON.parse(text);
  } catch (cause) {
    throw new TutorError(
      TutorErrorCodes.MALFORMED_SNAPSHOT,
      `${file} is not valid JSON`,
      { operation: 'restoreSession', userId },
      cause
    );
  }

  const history = await orchestrator.restoreSession(userId, snapshot);
  console.log(
    green(`Restored ${history.interactions.length} interaction(s) and ${history.flashcards.length} flashcard(s) for ${userId}`)
  );
}
