/**
 * Fact Listing Commands
 *
 * `facts` lists every active fact with its review stage and due date.
 * `history <concept>` lists every version of one concept, newest first,
 * with the change summary that explains each revision.
 */

import { isActive, normalizeConceptKey } from '../../core/models';
import type { FactStore } from '../../storage/repositories/fact.repository';
import type { ReviewQueue } from '../../core/scheduler';
import {
  bold,
  dim,
  yellow,
  formatDueDate,
  formatSeparator,
  formatStage,
  printBlankLine,
  truncateContent,
} from '../utils/terminal';

/** Maximum characters to display for truncated fact content */
const MAX_CONTENT_LENGTH = 70;

export async function runFactsCommand(factStore: FactStore, reviewQueue: ReviewQueue): Promise<void> {
  const facts = await factStore.listActive();
  const now = new Date();

  printBlankLine();
  console.log(bold('Remembered Facts:'));
  console.log(formatSeparator(60));

  if (facts.length === 0) {
    console.log(yellow('  No facts yet.'));
    console.log(dim('  Start a conversation with "learn" to build your notes.'));
  }

  for (const fact of facts) {
    const state = await reviewQueue.getReviewState(fact.id);
    const schedule = state ? `${formatStage(state.stage)} · ${formatDueDate(state.dueAt, now)}` : dim('unscheduled');
    console.log(`  ${bold(fact.conceptKey.replace(/_/g, ' '))} ${dim(`v${fact.version}`)}  ${schedule}`);
    console.log(`    ${dim(truncateContent(fact.content, MAX_CONTENT_LENGTH))}`);
  }

  console.log(formatSeparator(60));
  printBlankLine();
}

/**
 * @returns The process exit code: 1 when the concept has no facts
 */
export function runHistoryCommand(factStore: FactStore, concept: string): number {
  const conceptKey = normalizeConceptKey(concept);

  printBlankLine();
  console.log(bold(`History of "${conceptKey.replace(/_/g, ' ')}":`));
  console.log(formatSeparator(60));

  let versions = 0;
  for (const fact of factStore.history(conceptKey)) {
    versions += 1;
    const status = isActive(fact) ? yellow('active') : dim('superseded');
    console.log(`  ${bold(`v${fact.version}`)} ${status} ${dim(fact.createdAt.toISOString())}`);
    console.log(`    ${fact.content.replace(/\n/g, '\n    ')}`);
    if (fact.changeSummary) {
      console.log(dim(`    ${fact.changeSummary.replace(/\n/g, '\n    ')}`));
    }
  }

  if (versions === 0) {
    console.log(yellow(`  No facts recorded for "${concept}".`));
  }

  console.log(formatSeparator(60));
  printBlankLine();
  return versions === 0 ? 1 : 0;
}
