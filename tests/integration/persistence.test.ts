/**
 * Integration Tests: Persistence
 *
 * Writes facts and review states to a database file, closes it, and checks
 * that a new connection reads back the same histories and schedules.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openDatabase, type DatabaseConnection } from '../../src/storage/db';
import { FactRepository } from '../../src/storage/repositories/fact.repository';
import { ReviewStateRepository } from '../../src/storage/repositories/review-state.repository';
import { InteractionRepository } from '../../src/storage/repositories/interaction.repository';
import { ReviewQueue } from '../../src/core/scheduler';
import { createTutorSession } from '../../src/core/session';
import { parseConfig } from '../../src/config';
import { FakeCollaborator } from '../helpers';

const now = new Date('2024-03-01T09:00:00Z');

const MEAN = 'The mean is the sum of the values divided by their count.';
const MEAN_WRONG = 'The mean is the middle value of sorted data.';
const MEDIAN = 'The median is the middle value of sorted data.';

describe('database file', () => {
  let dir: string;
  let path: string;
  let connection: DatabaseConnection | undefined;

  function reopen(): DatabaseConnection {
    connection?.sqlite.close();
    connection = openDatabase(path);
    return connection;
  }

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    dir = mkdtempSync(join(tmpdir(), 'stats-tutor-'));
    path = join(dir, 'tutor.db');
  });

  afterEach(() => {
    connection?.sqlite.close();
    connection = undefined;
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('reads back fact histories, schedules and the interaction log after reopening', async () => {
    const collaborator = new FakeCollaborator();
    const first = reopen();
    const session = createTutorSession(first.db, collaborator, parseConfig({}), { now: () => now });

    collaborator.extracted = [
      { conceptKey: 'mean', content: MEAN },
      { conceptKey: 'median', content: MEDIAN },
    ];
    await session.teach('What are the mean and the median?');
    collaborator.similarity = () => 0.8;
    collaborator.contradicts = () => true;
    collaborator.extracted = [{ conceptKey: 'mean', content: MEAN_WRONG }];
    await session.teach('Is the mean the middle value?');

    const [median] = await session.dueFacts(5).then((due) => due.filter((fact) => fact.conceptKey === 'median'));
    await session.answer(median, 'What is the median?', MEDIAN, 30_000);

    const historyBefore = [...new FactRepository(first.db).history('mean')];
    const statesBefore = await new ReviewStateRepository(first.db).findAll();
    const dueBefore = await new ReviewQueue(new ReviewStateRepository(first.db)).nextDueFacts(now, 5);

    const { db } = reopen();
    const facts = new FactRepository(db);
    const reviewQueue = new ReviewQueue(new ReviewStateRepository(db));

    const history = [...facts.history('mean')];
    expect(history).toEqual(historyBefore);
    expect(history.map((fact) => [fact.version, fact.content])).toEqual([
      [2, MEAN_WRONG],
      [1, MEAN],
    ]);
    expect(history[1].supersededBy).toBe(history[0].id);
    expect(await facts.getActive('mean')).toEqual(history[0]);

    expect(await new ReviewStateRepository(db).findAll()).toEqual(statesBefore);
    const due = await reviewQueue.nextDueFacts(now, 5);
    expect(due).toEqual(dueBefore);
    expect(due.map((fact) => fact.id)).toEqual([history[0].id]);

    const medianState = await reviewQueue.getReviewState(median.id);
    expect(medianState?.stage).toBe('learning');
    expect(medianState?.outcomes).toEqual([{ timestamp: now, correct: true, latencyMs: 30_000 }]);

    const log = await new InteractionRepository(db).findAll();
    expect(log.map((entry) => entry.role)).toEqual(['learner', 'tutor', 'learner', 'tutor']);
  });

  it('migrates the file only once', () => {
    reopen();
    const { sqlite } = reopen();

    expect(sqlite.prepare('SELECT count(*) FROM __drizzle_migrations').pluck().get()).toBe(1);
  });
});
