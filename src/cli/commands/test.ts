/**
 * Test Command Handler
 *
 * Quizzes the learner on facts that are due for review. Each answer is
 * graded and timed; the outcome reschedules the fact. Typing `skip` moves
 * on without recording anything, and `exit` ends the quiz early.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- test --limit 5
 * ```
 */

import type { TutorSession } from '../../core/session';
import type { LinePrompt } from '../utils/prompt';
import { isUnrecoverable } from '../utils/errors';
import {
  bold,
  dim,
  green,
  yellow,
  red,
  formatDueDate,
  formatStage,
  formatTutorMessage,
  printBlankLine,
  printTestBanner,
  printTestSummary,
} from '../utils/terminal';

/**
 * Runs one quiz over at most `limit` due facts.
 *
 * @returns The process exit code: 0, or 1 after an unrecoverable
 *          collaborator failure
 */
export async function runTestCommand(session: TutorSession, prompt: LinePrompt, limit: number): Promise<number> {
  const due = await session.dueFacts(limit);

  if (due.length === 0) {
    console.log(yellow('\nNo facts are due for review.'));
    console.log(dim('Learn something new with "learn", or check back later.'));
    printBlankLine();
    return 0;
  }

  printTestBanner(due.length);

  let answered = 0;
  let correct = 0;

  for (const fact of due) {
    const asked = await session.askQuestion(fact);
    if (!asked.ok) {
      console.log(red(`Error preparing a question: ${asked.error.message}`));
      if (isUnrecoverable(asked.error)) {
        return 1;
      }
      continue;
    }
    if (asked.value.skipped) {
      console.log(yellow(`Skipping "${fact.conceptKey.replace(/_/g, ' ')}": ${asked.value.reason}`));
      if (isUnrecoverable(asked.value.error)) {
        return 1;
      }
      continue;
    }

    const question = asked.value.question;
    console.log(formatTutorMessage(question));
    const startedAt = Date.now();
    const line = await prompt.ask(bold('Answer: '));
    if (line === null) {
      break;
    }

    const input = line.trim();
    if (input.toLowerCase() === 'exit') {
      break;
    }
    if (input.toLowerCase() === 'skip') {
      console.log(dim('Skipped.'));
      printBlankLine();
      continue;
    }

    const graded = await session.answer(fact, question, input, Date.now() - startedAt);
    if (!graded.ok) {
      console.log(red(`Error recording your answer: ${graded.error.message}`));
      if (isUnrecoverable(graded.error)) {
        return 1;
      }
      continue;
    }
    if (graded.value.skipped) {
      console.log(yellow(`Could not grade this answer: ${graded.value.reason}`));
      if (isUnrecoverable(graded.value.error)) {
        return 1;
      }
      printBlankLine();
      continue;
    }

    answered += 1;
    const result = graded.value;
    if (result.correct) {
      correct += 1;
      console.log(green('Correct!'));
    } else {
      console.log(red('Not quite.'));
    }
    if (result.feedback) {
      console.log(dim(result.feedback));
    }
    console.log(
      dim(`Stage: `) + formatStage(result.reviewState.stage) + dim(' · ') + formatDueDate(result.reviewState.dueAt)
    );
    printBlankLine();
  }

  printTestSummary(answered, correct);
  return 0;
}
