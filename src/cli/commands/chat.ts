/**
 * Chat Command Handler
 *
 * An interactive tutoring session in the terminal. Plain lines are sent to
 * the tutor as messages; slash commands switch mode, paste code, reveal
 * hints and list flashcards.
 *
 * In debugging mode, paste code with `/code` first: the pasted code is sent
 * with every following message until new code replaces it.
 *
 * Usage:
 * ```bash
 * npm run cli -- chat user_42
 * ```
 */

import * as readline from 'node:readline';
import type { TutoringOrchestrator, TutorDecision } from '@/core/orchestrator';
import { toPublicError } from '@/core/errors';
import type { LearningStyle, TutorMode } from '@/core/models';
import {
  bold,
  dim,
  green,
  red,
  yellow,
  formatConfusionBadge,
  formatFlashcard,
  formatSeparator,
  formatTutorMessage,
  printBlankLine,
  printCommandsHelp,
} from '../utils/terminal';

const MODES: readonly TutorMode[] = ['learning', 'debugging'];
const STYLES: readonly LearningStyle[] = ['ELI5', 'Visual', 'Standard'];

interface ChatState {
  code: string | null;
  /** Lines collected while pasting code; null when not pasting */
  pasting: string[] | null;
  sessionId: string | null;
}

export interface ChatOptions {
  language?: string;
}

function printDecision(decision: TutorDecision): void {
  printBlankLine();
  console.log(formatTutorMessage(decision.responseText));
  console.log(
    formatConfusionBadge(decision.confusionLevel, decision.confusionScore, decision.badgeColor)
  );
  if (decision.hintSession) {
    const { subject, currentLevel, reused } = decision.hintSession;
    console.log(
      dim(
        `Found a ${subject.errorType} error${subject.lineNumber === null ? '' : ` on line ${subject.lineNumber}`}. ` +
          `${reused ? 'Continuing' : 'Starting'} hints at level ${currentLevel}; type /hint for the next one.`
      )
    );
  }
  for (const card of decision.flashcards) {
    console.log(green(`New flashcard ${card.id}: ${card.front}`));
  }
  for (const warning of decision.warnings) {
    console.log(yellow(`${warning.code}: ${warning.message}`));
  }
  printBlankLine();
}

async function handleCommand(
  orchestrator: TutoringOrchestrator,
  userId: string,
  state: ChatState,
  command: string,
  argument: string
): Promise<'quit' | 'continue'> {
  switch (command) {
    case '/quit':
    case '/exit':
      return 'quit';

    case '/help':
      printCommandsHelp();
      return 'continue';

    case '/mode': {
      const mode = MODES.find((m) => m === argument);
      if (!mode) {
        console.log(red(`Usage: /mode ${MODES.join('|')}`));
        return 'continue';
      }
      const user = await orchestrator.switchMode(userId, mode);
      console.log(green(`Mode: ${user.mode}`));
      return 'continue';
    }

    case '/style': {
      const style = STYLES.find((s) => s.toLowerCase() === argument.toLowerCase());
      if (!style) {
        console.log(red(`Usage: /style ${STYLES.join('|')}`));
        return 'continue';
      }
      const user = await orchestrator.setLearningStyle(userId, style);
      console.log(green(`Learning style: ${user.learningStyle}`));
      return 'continue';
    }

    case '/code':
      state.pasting = [];
      console.log(dim('Paste your code, then a line with only "." to finish.'));
      return 'continue';

    case '/hint': {
      if (!state.sessionId) {
        console.log(yellow('No debugging session yet. Send a message with code first.'));
        return 'continue';
      }
      const result = await orchestrator.requestNextHint(state.sessionId);
      if (!result.ok) {
        console.log(yellow(`${result.error.code}: ${result.error.message}`));
        return 'continue';
      }
      const hint = result.value;
      console.log(formatTutorMessage(`(${hint.tier}) ${hint.content}`));
      if (!hint.hasNext) {
        console.log(dim('That was the last hint.'));
      }
      return 'continue';
    }

    case '/cards': {
      const cards = await orchestrator.listFlashcards(userId);
      if (cards.length === 0) {
        console.log(dim('No flashcards yet.'));
      }
      for (const card of cards) {
        console.log(formatFlashcard(card));
      }
      return 'continue';
    }

    default:
      console.log(red(`Unknown command ${command}. Type /help.`));
      return 'continue';
  }
}

/**
 * Runs the interactive chat until /quit or end of input.
 */
export async function runChatCommand(
  orchestrator: TutoringOrchestrator,
  userId: string,
  options: ChatOptions = {}
): Promise<void> {
  const user = await orchestrator.getUser(userId);

  console.log(bold(`Debug Mentor - ${userId}`));
  console.log(dim(`Mode: ${user.mode}  Style: ${user.learningStyle}  (type /help for commands)`));
  console.log(formatSeparator());

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  const state: ChatState = { code: null, pasting: null, sessionId: null };

  rl.prompt();
  for await (const line of rl) {
    if (state.pasting !== null) {
      if (line.trim() === '.') {
        state.code = state.pasting.join('\n');
        state.pasting = null;
        console.log(dim(`Code saved (${state.code.split('\n').length} line(s)). Now describe the problem.`));
        rl.prompt();
      } else {
        state.pasting.push(line);
      }
      continue;
    }

    const input = line.trim();
    if (input.length === 0) {
      rl.prompt();
      continue;
    }

    try {
      if (input.startsWith('/')) {
        const [command, ...rest] = input.split(/\s+/);
        if ((await handleCommand(orchestrator, userId, state, command, rest.join(' '))) === 'quit') {
          break;
        }
      } else {
        const decision = await orchestrator.handleMessage({
          userId,
          message: input,
          code: state.code,
          language: options.language ?? null,
          sessionId: state.sessionId ?? undefined,
        });
        state.sessionId = decision.hintSession?.sessionId ?? state.sessionId;
        printDecision(decision);
      }
    } catch (error) {
      const { code, message } = toPublicError(error);
      console.log(red(`${code}: ${message}`));
    }

    rl.prompt();
  }

  rl.close();
  console.log(dim('Bye.'));
}
