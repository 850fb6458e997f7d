/**
 * Stats Command Handler
 *
 * Prints how many facts are in each review stage, how many are due now,
 * and the average memory strength of the active facts.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- stats
 * ```
 */

import type { ReviewQueue } from '../../core/scheduler';
import type { FactStore } from '../../storage/repositories/fact.repository';
import type { ReviewStage } from '../../core/models';
import {
  bold,
  dim,
  yellow,
  formatSeparator,
  formatStage,
  printBlankLine,
  renderAsciiBar,
} from '../utils/terminal';

const STAGES: ReviewStage[] = ['new', 'learning', 'review', 'mastered'];

export async function runStatsCommand(factStore: FactStore, reviewQueue: ReviewQueue): Promise<void> {
  const summary = await reviewQueue.summarize(new Date());
  const facts = await factStore.listActive();

  let strengthTotal = 0;
  for (const fact of facts) {
    const state = await reviewQueue.getReviewState(fact.id);
    strengthTotal += state?.strength ?? 0;
  }
  const averageStrength = facts.length > 0 ? strengthTotal / facts.length : 0;

  printBlankLine();
  console.log(bold('Study Statistics'));
  console.log(formatSeparator(60));
  console.log(`  Active facts:  ${yellow(facts.length.toString())}`);
  console.log(`  Due now:       ${yellow(summary.due.toString())}`);
  printBlankLine();
  for (const stage of STAGES) {
    console.log(`  ${formatStage(stage).padEnd(20)} ${summary.byStage[stage]}`);
  }
  printBlankLine();
  console.log(`  Average strength: ${renderAsciiBar(averageStrength)} ${dim(`${Math.round(averageStrength * 100)}%`)}`);
  console.log(formatSeparator(60));
  printBlankLine();
}
