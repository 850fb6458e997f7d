#!/usr/bin/env -S npx tsx
/**
 * CLI Entry Point for the Statistics Tutor
 *
 * Parses command-line arguments with commander, opens the database and
 * routes to the command handlers.
 *
 * Available Commands:
 * - `learn` - Talk with the tutor; facts from each exchange are remembered
 * - `test [--limit n]` - Quiz on the facts that are due for review
 * - `facts` - List the active facts with their review schedule
 * - `history <concept>` - Show every version of one concept
 * - `stats` - Show counts per review stage
 * - `migrate` - Create or update the database schema
 *
 * Usage:
 * ```bash
 * npm run cli -- learn
 * npm run cli -- test --limit 5
 * npm run cli -- history "standard deviation"
 * ```
 *
 * Exit code 0 on normal termination; 1 on invalid configuration or when
 * the collaborator rejects the API key.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { config, ConfigValidationError, validateConfig } from '../config';
import {
  openDatabase,
  listTables,
  countAppliedMigrations,
  MIGRATIONS_FOLDER,
  type DatabaseConnection,
} from '../storage';
import { FactRepository, ReviewStateRepository } from '../storage/repositories';
import { ReviewQueue, Scheduler } from '../core/scheduler';
import { createTutorSession, type TutorSession } from '../core/session';
import { AnthropicClient, AnthropicCollaborator, LLMError } from '../llm';
import { runLearnCommand } from './commands/learn';
import { runTestCommand } from './commands/test';
import { runFactsCommand, runHistoryCommand } from './commands/facts';
import { runStatsCommand } from './commands/stats';
import { createLinePrompt, type LinePrompt } from './utils/prompt';
import { dim, green, red } from './utils/terminal';

/** Default number of facts quizzed per `test` run */
const DEFAULT_TEST_LIMIT = 10;

/**
 * Opens the database, runs `command` and closes the database again.
 */
async function withDatabase(command: (connection: DatabaseConnection) => Promise<number>): Promise<void> {
  const connection = openDatabase();
  try {
    process.exitCode = await command(connection);
  } finally {
    connection.sqlite.close();
  }
}

function reviewQueueFor(connection: DatabaseConnection): ReviewQueue {
  return new ReviewQueue(new ReviewStateRepository(connection.db), new Scheduler(config.scheduler));
}

/**
 * Runs an interactive command against a tutor session backed by the
 * Anthropic collaborator.
 */
async function withTutor(
  command: (session: TutorSession, prompt: LinePrompt, connection: DatabaseConnection) => Promise<number>
): Promise<void> {
  validateConfig();
  const collaborator = new AnthropicCollaborator(new AnthropicClient());

  await withDatabase(async (connection) => {
    const prompt = createLinePrompt();
    try {
      const session = createTutorSession(connection.db, collaborator, config, { signal: prompt.signal });
      return await command(session, prompt, connection);
    } finally {
      prompt.close();
    }
  });
}

function parseLimit(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new ConfigValidationError(`--limit must be a positive integer, got "${value}"`, [], [
      { name: 'limit', reason: 'not a positive integer' },
    ]);
  }
  return parsed;
}

function createProgram(): Command {
  const program = new Command('stats-tutor')
    .description('A statistics tutor that remembers what you learned and quizzes you on it')
    .showHelpAfterError();

  program
    .command('learn')
    .description('Start an interactive tutoring conversation')
    .action(async () => {
      await withTutor(async (session, prompt, connection) => {
        const active = await new FactRepository(connection.db).listActive();
        return runLearnCommand(session, prompt, active.length);
      });
    });

  program
    .command('test')
    .description('Quiz yourself on facts that are due for review')
    .option('-n, --limit <count>', 'Maximum number of facts to quiz', String(DEFAULT_TEST_LIMIT))
    .action(async (options: { limit: string }) => {
      const limit = parseLimit(options.limit);
      await withTutor((session, prompt) => runTestCommand(session, prompt, limit));
    });

  program
    .command('facts')
    .description('List remembered facts and their review schedule')
    .action(async () => {
      await withDatabase(async (connection) => {
        await runFactsCommand(new FactRepository(connection.db), reviewQueueFor(connection));
        return 0;
      });
    });

  program
    .command('history <concept>')
    .description('Show every version of a concept, newest first')
    .action(async (concept: string) => {
      await withDatabase(async (connection) => runHistoryCommand(new FactRepository(connection.db), concept));
    });

  program
    .command('stats')
    .description('Show review statistics')
    .action(async () => {
      await withDatabase(async (connection) => {
        await runStatsCommand(new FactRepository(connection.db), reviewQueueFor(connection));
        return 0;
      });
    });

  program
    .command('migrate')
    .description('Create or update the database schema')
    .action(async () => {
      await withDatabase(async (connection) => {
        console.log(`[migrate] Migrations folder: ${MIGRATIONS_FOLDER}`);
        console.log(`[migrate] ${countAppliedMigrations(connection.sqlite)} migration(s) applied`);
        console.log(green(`Tables: ${listTables(connection.sqlite).join(', ')}`));
        return 0;
      });
    });

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(red(`Configuration error: ${error.message}`));
    if (error.missingVars.includes('ANTHROPIC_API_KEY')) {
      console.error(dim('Get your API key at: https://console.anthropic.com/'));
      console.error(dim('Then set it in .env or: export ANTHROPIC_API_KEY=your-key-here'));
    }
  } else if (error instanceof LLMError) {
    console.error(red(`LLM error (${error.type}): ${error.message}`));
  } else {
    console.error(red('\nFatal error:'));
    console.error(dim(error instanceof Error ? error.message : String(error)));
    // Show stack trace when debugging
    if (process.env.DEBUG && error instanceof Error) {
      console.error(dim(error.stack || ''));
    }
  }
  process.exitCode = 1;
});
