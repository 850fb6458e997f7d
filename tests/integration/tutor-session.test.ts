/**
 * Tutor Session Integration Tests
 *
 * Drives learn and test turns through the real stores, dedup engine and
 * scheduler, with a FakeCollaborator in place of the LLM.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTestContext, cleanupTestContext, type TestContext } from '../setup';
import { FakeCollaborator } from '../helpers';
import { DedupEngine } from '../../src/core/dedup';
import { TutorSession, type SessionEvent, type TutorSessionDependencies } from '../../src/core/session';
import { ReviewQueue } from '../../src/core/scheduler';
import { CollaboratorError, ConflictError, UnknownFactError } from '../../src/core/errors';
import type { Fact } from '../../src/core/models';
import { FactRepository, type FactRevision, type FactWriteHook } from '../../src/storage/repositories/fact.repository';

const now = new Date('2024-03-01T09:00:00Z');

const MEAN = 'The mean is the sum of the values divided by their count.';
const MEAN_WRONG = 'The mean is the middle value of sorted data.';
const MEAN_MORE = 'The mean is sensitive to outliers.';
const MEAN_OTHER = 'The mean is the expected value of a sample.';

function diskError(): Error {
  return Object.assign(new Error('disk I/O error'), { code: 'SQLITE_IOERR' });
}

/** Review queue whose writes inside a fact transaction always fail */
class BrokenReviewQueue extends ReviewQueue {
  override trackWithin(): void {
    throw diskError();
  }

  override handOverWithin(): void {
    throw diskError();
  }
}

/**
 * Fact store where another writer supersedes the target first, the next
 * `races` times a supersede is attempted.
 */
class RacingFactStore extends FactRepository {
  races = 1;
  attempts = 0;

  override async supersede(oldId: string, revision: FactRevision, onWrite?: FactWriteHook): Promise<Fact> {
    this.attempts += 1;
    if (this.races > 0) {
      this.races -= 1;
      await super.supersede(oldId, { content: MEAN_OTHER }, onWrite);
    }
    return super.supersede(oldId, revision, onWrite);
  }
}

describe('TutorSession', () => {
  let ctx: TestContext;
  let collaborator: FakeCollaborator;
  let session: TutorSession;

  function sessionWith(overrides: Partial<TutorSessionDependencies>): TutorSession {
    return new TutorSession(
      {
        factStore: ctx.factStore,
        reviewQueue: ctx.reviewQueue,
        interactions: ctx.interactions,
        collaborator,
        dedup: new DedupEngine(collaborator),
        ...overrides,
      },
      { now: () => now }
    );
  }

  async function activeFact(conceptKey: string): Promise<Fact> {
    const fact = await ctx.factStore.getActive(conceptKey);
    if (!fact) {
      throw new Error(`no active fact for ${conceptKey}`);
    }
    return fact;
  }

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    ctx = createTestContext();
    collaborator = new FakeCollaborator();
    session = sessionWith({});
  });

  afterEach(() => {
    cleanupTestContext(ctx);
    vi.restoreAllMocks();
  });

  describe('teach', () => {
    it('answers, remembers extracted facts and logs both sides of the exchange', async () => {
      collaborator.reply = 'The mean adds everything up and divides by n.';
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN }];

      const turn = await session.teach('What is the mean?');

      expect(turn.ok).toBe(true);
      if (!turn.ok) return;
      expect(turn.value.reply).toBe('The mean adds everything up and divides by n.');
      expect(turn.value.extractionDegraded).toBe(false);

      const fact = await activeFact('mean');
      expect(fact.content).toBe(MEAN);
      expect(turn.value.changes).toEqual([{ conceptKey: 'mean', kind: 'new', factId: fact.id, degraded: false }]);

      const state = await ctx.reviewQueue.getReviewState(fact.id);
      expect(state?.stage).toBe('new');
      expect(state?.dueAt).toEqual(now);

      const log = await ctx.interactions.findAll();
      expect(log.map((entry) => [entry.role, entry.text, entry.derivedFactIds])).toEqual([
        ['learner', 'What is the mean?', []],
        ['tutor', 'The mean adds everything up and divides by n.', [fact.id]],
      ]);
    });

    it('replays earlier interactions as conversation context', async () => {
      collaborator.reply = 'First answer.';
      await session.teach('First question');
      collaborator.reply = 'Second answer.';
      await session.teach('Second question');

      expect(collaborator.lastHistory.map((entry) => entry.text)).toEqual(['First question', 'First answer.']);
    });

    it('classifies a repeated fact as a duplicate without consulting the collaborator', async () => {
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN }];
      await session.teach('What is the mean?');
      const first = await activeFact('mean');

      const turn = await session.teach('Tell me again?');

      expect(turn.ok && turn.value.changes).toEqual([
        { conceptKey: 'mean', kind: 'duplicate', factId: first.id, degraded: false },
      ]);
      expect(collaborator.calls.similarity).toBe(0);
      expect([...ctx.factStore.history('mean')]).toHaveLength(1);

      const log = await ctx.interactions.findAll();
      expect(log[3].derivedFactIds).toEqual([]);
    });

    it('supersedes a contradicted fact and moves its schedule to the new version', async () => {
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN }];
      await session.teach('What is the mean?');
      const v1 = await activeFact('mean');

      collaborator.similarity = () => 0.8;
      collaborator.contradicts = () => true;
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN_WRONG }];
      const turn = await session.teach('Is the mean the middle value?');

      const v2 = await activeFact('mean');
      expect(turn.ok && turn.value.changes).toEqual([
        { conceptKey: 'mean', kind: 'update', factId: v2.id, degraded: false },
      ]);
      expect(v2.version).toBe(2);
      expect(v2.content).toBe(MEAN_WRONG);
      expect(v2.changeSummary).toBe(`- ${MEAN}\n+ ${MEAN_WRONG}`);

      expect(await ctx.reviewQueue.getReviewState(v1.id)).toBeNull();
      expect((await ctx.reviewQueue.getReviewState(v2.id))?.stage).toBe('new');
    });

    it('keeps a consistent elaboration by joining it with the active fact', async () => {
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN }];
      await session.teach('What is the mean?');

      collaborator.similarity = () => 0.7;
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN_MORE }];
      const turn = await session.teach('Any caveats?');

      const active = await activeFact('mean');
      expect(turn.ok && turn.value.changes[0].kind).toBe('new');
      expect(active.version).toBe(2);
      expect(active.content).toBe(`${MEAN}\n${MEAN_MORE}`);
      expect(active.changeSummary).toBe(`+ ${MEAN_MORE}`);
    });

    it('keeps the candidate when the dedup engine cannot reach the collaborator', async () => {
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN }];
      await session.teach('What is the mean?');

      collaborator.failing.add('similarity');
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN_MORE }];
      const turn = await session.teach('Any caveats?');

      expect(turn.ok && turn.value.changes[0]).toMatchObject({ kind: 'new', degraded: true });
      expect(await ctx.factStore.listActive()).toHaveLength(1);
      expect((await activeFact('mean')).content).toBe(`${MEAN}\n${MEAN_MORE}`);
    });

    it('still replies when fact extraction fails', async () => {
      collaborator.failing.add('extract');

      const turn = await session.teach('What is a histogram?');

      expect(turn.ok).toBe(true);
      if (!turn.ok) return;
      expect(turn.value.extractionDegraded).toBe(true);
      expect(turn.value.changes).toEqual([]);
      expect(await ctx.interactions.findAll()).toHaveLength(2);
    });

    it('fails only the current turn when the tutor reply cannot be produced', async () => {
      collaborator.failing.add('respond');

      const failed = await session.teach('What is a histogram?');
      expect(failed.ok).toBe(false);
      if (failed.ok) return;
      expect(failed.error).toBeInstanceOf(CollaboratorError);

      collaborator.failing.delete('respond');
      const next = await session.teach('What is a histogram?');
      expect(next.ok).toBe(true);
    });

    it('rejects empty learner text', async () => {
      const turn = await session.teach('   ');
      expect(turn.ok).toBe(false);
      expect(collaborator.calls.respond).toBe(0);
    });

    it('never leaves more than one active fact per concept', async () => {
      const script: Array<{ content: string; similarity: number; contradicts: boolean }> = [
        { content: MEAN, similarity: 0, contradicts: false },
        { content: MEAN_MORE, similarity: 0.6, contradicts: false },
        { content: MEAN_WRONG, similarity: 0.8, contradicts: true },
        { content: 'Unrelated note about the mean.', similarity: 0.1, contradicts: false },
        { content: MEAN, similarity: 0.95, contradicts: false },
      ];

      for (const step of script) {
        collaborator.similarity = () => step.similarity;
        collaborator.contradicts = () => step.contradicts;
        collaborator.extracted = [
          { conceptKey: 'mean', content: step.content },
          { conceptKey: 'median', content: 'The median is the middle value.' },
        ];
        await session.teach('Next question');
      }

      const active = await ctx.factStore.listActive();
      expect(active.map((fact) => fact.conceptKey)).toEqual(['mean', 'median']);
      const summary = await ctx.reviewQueue.summarize(now);
      expect(summary.total).toBe(2);
    });

    it('reports stored facts to the event listener', async () => {
      const events: SessionEvent[] = [];
      session.setEventListener((event) => events.push(event));
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN }];

      await session.teach('What is the mean?');

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'fact_stored', kind: 'new', timestamp: now });
    });
  });

  describe('store failures', () => {
    beforeEach(async () => {
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN }];
      await session.teach('What is the mean?');
      collaborator.similarity = () => 0.8;
      collaborator.contradicts = () => true;
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN_WRONG }];
    });

    it('rolls back a superseding version when its schedule cannot be written', async () => {
      const v1 = await activeFact('mean');
      const broken = sessionWith({ reviewQueue: new BrokenReviewQueue(ctx.reviewStates, ctx.scheduler) });

      const turn = await broken.teach('Is the mean the middle value?');

      expect(turn.ok).toBe(false);
      if (turn.ok) return;
      expect(turn.error.message).toBe('disk I/O error');
      expect(await activeFact('mean')).toEqual(v1);
      expect([...ctx.factStore.history('mean')]).toHaveLength(1);
      expect((await ctx.reviewQueue.getReviewState(v1.id))?.stage).toBe('new');
      expect((await ctx.reviewQueue.summarize(now)).total).toBe(1);
    });

    it('stores no new fact when its schedule cannot be written', async () => {
      const broken = sessionWith({ reviewQueue: new BrokenReviewQueue(ctx.reviewStates, ctx.scheduler) });
      collaborator.extracted = [{ conceptKey: 'median', content: 'The median is the middle value.' }];

      const turn = await broken.teach('What is the median?');

      expect(turn.ok).toBe(false);
      expect(await ctx.factStore.getActive('median')).toBeNull();
      expect((await ctx.reviewQueue.summarize(now)).total).toBe(1);
    });

    it('rereads and applies the update when another writer superseded the fact first', async () => {
      const store = new RacingFactStore(ctx.db);
      const racing = sessionWith({ factStore: store });

      const turn = await racing.teach('Is the mean the middle value?');

      expect(turn.ok).toBe(true);
      const active = await activeFact('mean');
      expect(turn.ok && turn.value.changes).toEqual([
        { conceptKey: 'mean', kind: 'update', factId: active.id, degraded: false },
      ]);
      expect(store.attempts).toBe(2);
      expect(active.version).toBe(3);
      expect(active.content).toBe(MEAN_WRONG);
      expect(active.changeSummary).toBe(`- ${MEAN_OTHER}\n+ ${MEAN_WRONG}`);
      expect(await ctx.factStore.listActive()).toHaveLength(1);
      expect((await ctx.reviewQueue.summarize(now)).total).toBe(1);
      expect((await ctx.reviewQueue.getReviewState(active.id))?.stage).toBe('new');
    });

    it('fails the turn after a second conflict and keeps the session usable', async () => {
      const store = new RacingFactStore(ctx.db);
      store.races = 2;
      const racing = sessionWith({ factStore: store });

      const turn = await racing.teach('Is the mean the middle value?');

      expect(turn.ok).toBe(false);
      if (turn.ok) return;
      expect(turn.error).toBeInstanceOf(ConflictError);
      expect(store.attempts).toBe(2);
      expect(await ctx.factStore.listActive()).toHaveLength(1);
      expect((await ctx.reviewQueue.summarize(now)).total).toBe(1);

      collaborator.extracted = [{ conceptKey: 'median', content: 'The median is the middle value.' }];
      const next = await racing.teach('What is the median?');
      expect(next.ok).toBe(true);
      expect((await activeFact('median')).version).toBe(1);
    });
  });

  describe('test turns', () => {
    beforeEach(async () => {
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN }];
      await session.teach('What is the mean?');
    });

    it('quizzes a due fact and reschedules it after a correct answer', async () => {
      const [fact] = await session.dueFacts(5);
      expect(fact.conceptKey).toBe('mean');

      const asked = await session.askQuestion(fact);
      expect(asked.ok && asked.value).toEqual({ skipped: false, question: 'What do you remember about mean?' });

      const graded = await session.answer(fact, 'What do you remember about mean?', MEAN, 30_000);
      expect(graded.ok).toBe(true);
      if (!graded.ok || graded.value.skipped) return;
      expect(graded.value.correct).toBe(true);
      expect(graded.value.feedback).toBe('Well done.');
      expect(graded.value.reviewState.stage).toBe('learning');
      expect(graded.value.reviewState.intervalDays).toBe(1);

      expect(await session.dueFacts(5)).toEqual([]);
    });

    it('resets to learning after an incorrect answer', async () => {
      const [fact] = await session.dueFacts(5);

      const graded = await session.answer(fact, 'What is the mean?', 'The most common value.', 30_000);

      expect(graded.ok && !graded.value.skipped && graded.value.correct).toBe(false);
      const state = await ctx.reviewQueue.getReviewState(fact.id);
      expect(state?.stage).toBe('learning');
      expect(state?.consecutiveCorrect).toBe(0);
    });

    it('skips a fact when no question can be generated', async () => {
      collaborator.failing.add('generate_question');
      const [fact] = await session.dueFacts(5);

      const asked = await session.askQuestion(fact);

      expect(asked.ok && asked.value).toMatchObject({ skipped: true, reason: 'simulated outage' });
      expect(asked.ok && asked.value.skipped && asked.value.error).toBeInstanceOf(CollaboratorError);
    });

    it('records nothing when the answer cannot be graded', async () => {
      collaborator.failing.add('grade');
      const [fact] = await session.dueFacts(5);

      const graded = await session.answer(fact, 'What is the mean?', MEAN, 30_000);

      expect(graded.ok && graded.value.skipped).toBe(true);
      expect((await ctx.reviewQueue.getReviewState(fact.id))?.outcomes).toEqual([]);
    });

    it('records the outcome on the current version when the fact was superseded meanwhile', async () => {
      const [asked] = await session.dueFacts(5);

      collaborator.similarity = () => 0.8;
      collaborator.contradicts = () => true;
      collaborator.extracted = [{ conceptKey: 'mean', content: MEAN_WRONG }];
      await session.teach('Is the mean the middle value?');
      const current = await activeFact('mean');

      const graded = await session.answer(asked, 'What is the mean?', MEAN, 30_000);

      expect(graded.ok).toBe(true);
      if (!graded.ok || graded.value.skipped) return;
      expect(graded.value.reviewState.factId).toBe(current.id);
      expect(graded.value.reviewState.outcomes).toHaveLength(1);
    });

    it('fails the turn when the retry fails too, and keeps the session usable', async () => {
      const ghost: Fact = {
        id: 'fact_ghost',
        conceptKey: 'ghost',
        content: 'Never stored.',
        version: 1,
        supersededBy: null,
        changeSummary: null,
        createdAt: now,
        updatedAt: now,
      };

      const graded = await session.answer(ghost, 'Question?', 'Never stored.', 30_000);

      expect(graded.ok).toBe(false);
      if (graded.ok) return;
      expect(graded.error).toBeInstanceOf(UnknownFactError);

      const [fact] = await session.dueFacts(5);
      const next = await session.answer(fact, 'What is the mean?', MEAN, 30_000);
      expect(next.ok).toBe(true);
    });
  });
});
