/**
 * Learn Command Handler
 *
 * Interactive learn mode: the learner asks about statistics, the tutor
 * answers, and the facts established by each exchange are remembered for
 * later quizzing. Typing `exit` (or closing the input) ends the loop.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- learn
 * ```
 */

import type { TutorSession, FactChange } from '../../core/session';
import type { LinePrompt } from '../utils/prompt';
import { isUnrecoverable } from '../utils/errors';
import {
  bold,
  dim,
  green,
  yellow,
  red,
  formatTutorMessage,
  printLearnBanner,
  printBlankLine,
} from '../utils/terminal';

const EXIT_COMMANDS = new Set(['exit', 'quit']);

function describeChange(change: FactChange): string {
  const concept = change.conceptKey.replace(/_/g, ' ');
  switch (change.kind) {
    case 'new':
      return green(`  + remembered: ${concept}`) + (change.degraded ? dim(' (unchecked for duplicates)') : '');
    case 'update':
      return yellow(`  ~ corrected: ${concept}`);
    case 'duplicate':
      return dim(`  = already known: ${concept}`);
  }
}

/**
 * Runs learn mode until the learner exits.
 *
 * @returns The process exit code: 0, or 1 after an unrecoverable
 *          collaborator failure
 */
export async function runLearnCommand(
  session: TutorSession,
  prompt: LinePrompt,
  activeFactCount: number
): Promise<number> {
  printLearnBanner(activeFactCount);

  while (true) {
    const line = await prompt.ask(bold('You: '));
    if (line === null) {
      printBlankLine();
      return 0;
    }

    const input = line.trim();
    if (!input) {
      continue;
    }
    if (EXIT_COMMANDS.has(input.toLowerCase())) {
      return 0;
    }

    const turn = await session.teach(input);
    if (!turn.ok) {
      console.log(red('\nError processing your message:'));
      console.log(dim(turn.error.message));
      printBlankLine();
      if (isUnrecoverable(turn.error)) {
        return 1;
      }
      continue;
    }

    printBlankLine();
    console.log(formatTutorMessage(turn.value.reply));
    for (const change of turn.value.changes) {
      console.log(describeChange(change));
    }
    if (turn.value.extractionDegraded) {
      console.log(yellow('  (could not save facts from this exchange)'));
    }
    printBlankLine();
  }
}
