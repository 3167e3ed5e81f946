/**
 * CLI Entry Point
 *
 * Commands:
 * - `serve`                                 - Start the HTTP API
 * - `chat <userId>`                         - Interactive tutoring session
 * - `export <userId> [-o file]`             - Write a session history as JSON
 * - `restore <userId> <file>`               - Replace a session history from JSON
 * - `flashcards <userId> [--due] [--type t]` - List flashcards
 *
 * Usage:
 * ```bash
 * npm run cli -- chat user_42
 * npm run cli -- export user_42 -o user_42.json
 * npm run cli -- flashcards user_42 --due --type logic
 * ```
 *
 * Commands that never call the model (export, restore, flashcards) run
 * without an API key.
 */

import { Command } from 'commander';
import { config, validateConfig, ConfigValidationError } from '../config';
import { createOfflineTutor, createTutor, type Tutor } from '../bootstrap';
import { startServer, APP_VERSION } from '../api';
import { LLMError } from '../llm';
import { toPublicError } from '../core/errors';
import { runChatCommand } from './commands/chat';
import { runExportCommand, runRestoreCommand } from './commands/history';
import { runFlashcardsCommand, type FlashcardsOptions } from './commands/flashcards';
import { dim, red } from './utils/terminal';

/**
 * Runs a command against a tutor and always closes the database.
 */
async function withTutor(tutor: Tutor, run: (tutor: Tutor) => Promise<void>): Promise<void> {
  try {
    await run(tutor);
  } finally {
    tutor.db.$client.close();
  }
}

/**
 * Builds a tutor that talks to the model, with a friendly message when the
 * API key is missing.
 */
function createOnlineTutor(): Tutor {
  try {
    return createTutor(config);
  } catch (error) {
    if (error instanceof LLMError && error.type === 'authentication') {
      console.log(red('Error: ANTHROPIC_API_KEY environment variable is not set.'));
      console.log(dim('Then set it: export ANTHROPIC_API_KEY=your-key-here'));
      process.exit(1);
    }
    throw error;
  }
}

export function createProgram(): Command {
  const program = new Command('debug-mentor')
    .description('Adaptive tutoring for programming learners')
    .version(APP_VERSION);

  program
    .command('serve')
    .description('Start the HTTP API')
    .action(() => {
      validateConfig();
      const tutor = createOnlineTutor();
      startServer(
        tutor.orchestrator,
        { port: config.server.port, host: config.server.host, nodeEnv: config.server.nodeEnv },
        () => tutor.db.$client.close()
      );
    });

  program
    .command('chat <userId>')
    .description('Interactive tutoring session in the terminal')
    .option('-l, --language <language>', 'Language of pasted code (e.g. python)')
    .action(async (userId: string, options: { language?: string }) => {
      await withTutor(createOnlineTutor(), (tutor) =>
        runChatCommand(tutor.orchestrator, userId, options)
      );
    });

  program
    .command('export <userId>')
    .description("Write a learner's session history as JSON")
    .option('-o, --output <file>', 'Output file path (default: stdout)')
    .action(async (userId: string, options: { output?: string }) => {
      await withTutor(createOfflineTutor(config), (tutor) =>
        runExportCommand(tutor.orchestrator, userId, options)
      );
    });

  program
    .command('restore <userId> <file>')
    .description("Replace a learner's session history from a JSON export")
    .action(async (userId: string, file: string) => {
      await withTutor(createOfflineTutor(config), (tutor) =>
        runRestoreCommand(tutor.orchestrator, userId, file)
      );
    });

  program
    .command('flashcards <userId>')
    .description("List a learner's flashcards, oldest first")
    .option('--due', 'Only cards due for review')
    .option('-t, --type <type>', 'Only cards of one error type (syntax, logic, runtime)')
    .option('-n, --limit <count>', 'Maximum number of cards')
    .action(async (userId: string, options: FlashcardsOptions) => {
      await withTutor(createOfflineTutor(config), (tutor) =>
        runFlashcardsCommand(tutor.orchestrator, userId, options)
      );
    });

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(red(error.message));
      process.exit(1);
    }
    const { code, message } = toPublicError(error);
    if (code === 'INTERNAL_ERROR') {
      console.error(red('Unexpected error:'), error);
    } else {
      console.error(red(`${code}: ${message}`));
    }
    process.exit(1);
  }
}

await main();
