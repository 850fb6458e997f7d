/**
 * Tutor Session - Orchestrates Learn and Test Turns
 *
 * A learn turn logs the learner's message, asks the collaborator for the
 * tutor's reply, extracts candidate facts from the exchange, classifies
 * each against the active fact for its concept and applies the decision:
 *
 * | Classification        | Write                                               |
 * |-----------------------|-----------------------------------------------------|
 * | NEW, no active fact   | insert, start scheduling                            |
 * | NEW, active fact      | supersede with both contents joined                 |
 * | UPDATE                | supersede with the candidate, diff as changeSummary |
 * | DUPLICATE             | none                                                |
 *
 * A test turn picks due facts, asks a question about one, grades the
 * learner's answer and records the outcome with the scheduler.
 *
 * Collaborator failures degrade a single step (the candidate is kept, the
 * question is skipped). `UnknownFactError` and `ConflictError` are retried
 * once after rereading the active fact; a second failure, or any other
 * error, fails the current turn only. A fact and its review state commit
 * in one transaction; a failed turn never undoes earlier turns.
 */

import type { Fact } from '../models';
import { CollaboratorError, ConflictError, UnknownFactError } from '../errors';
import { formatDiff, splitSentences } from '../dedup';
import type { CandidateFact, GradeResult } from '../../llm/types';
import { TUTOR_HISTORY_LIMIT } from '../../llm/prompts/tutor';
import type {
  AnswerResult,
  FactChange,
  QuestionResult,
  SessionEvent,
  SessionEventListener,
  TeachResult,
  TurnResult,
  TutorSessionConfig,
  TutorSessionDependencies,
} from './types';

const DEFAULT_CONFIG: TutorSessionConfig = {
  historyLimit: TUTOR_HISTORY_LIMIT,
  now: () => new Date(),
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isRetryable(error: unknown): error is UnknownFactError | ConflictError {
  return error instanceof UnknownFactError || error instanceof ConflictError;
}

/**
 * @example
 * ```typescript
 * const session = new TutorSession({ factStore, reviewQueue, interactions, collaborator, dedup });
 *
 * const turn = await session.teach('How is the standard error different from the SD?');
 * if (turn.ok) console.log(turn.value.reply);
 *
 * const [fact] = await session.dueFacts(1);
 * const asked = await session.askQuestion(fact);
 * ```
 */
export class TutorSession {
  private readonly deps: TutorSessionDependencies;
  private readonly config: TutorSessionConfig;
  private eventListener?: SessionEventListener;

  constructor(deps: TutorSessionDependencies, config: Partial<TutorSessionConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Registers the listener that receives session events, or clears it.
   */
  setEventListener(listener: SessionEventListener | undefined): void {
    this.eventListener = listener;
  }

  // ===========================================================================
  // Learn mode
  // ===========================================================================

  /**
   * Runs one learn turn for `learnerText`.
   */
  async teach(learnerText: string): Promise<TurnResult<TeachResult>> {
    return this.runTurn('teach', async () => {
      const text = learnerText.trim();
      if (!text) {
        throw new RangeError('Learner text is empty');
      }

      const history = await this.deps.interactions.findRecent(this.config.historyLimit);
      await this.deps.interactions.create({ role: 'learner', text, timestamp: this.config.now() });

      const reply = await this.deps.collaborator.respond(history, text, { signal: this.config.signal });

      let candidates: CandidateFact[] = [];
      let extractionDegraded = false;
      try {
        candidates = await this.deps.collaborator.extractFacts(
          { learnerText: text, tutorText: reply },
          { signal: this.config.signal }
        );
      } catch (error) {
        if (!(error instanceof CollaboratorError)) {
          throw error;
        }
        extractionDegraded = true;
        this.degraded(error);
      }

      const changes: FactChange[] = [];
      for (const candidate of candidates) {
        changes.push(await this.withRetry(candidate.conceptKey, () => this.learnCandidate(candidate)));
      }

      await this.deps.interactions.create({
        role: 'tutor',
        text: reply,
        derivedFactIds: changes.filter((change) => change.kind !== 'duplicate').map((change) => change.factId),
        timestamp: this.config.now(),
      });

      return { reply, changes, extractionDegraded };
    });
  }

  /**
   * Classifies one candidate against the current active fact and applies
   * the decision. Rereads the active fact on every call, so a retry works
   * from fresh state.
   */
  private async learnCandidate(candidate: CandidateFact): Promise<FactChange> {
    const { factStore, dedup } = this.deps;
    const existing = await factStore.getActive(candidate.conceptKey);
    const classification = await dedup.classify(candidate.content, candidate.conceptKey, existing, {
      signal: this.config.signal,
    });

    switch (classification.kind) {
      case 'duplicate': {
        this.emit({
          type: 'fact_duplicate',
          factId: classification.factId,
          conceptKey: candidate.conceptKey,
          timestamp: this.config.now(),
        });
        return { conceptKey: candidate.conceptKey, kind: 'duplicate', factId: classification.factId, degraded: false };
      }

      case 'update': {
        const fact = await this.replace(classification.factId, {
          content: candidate.content,
          changeSummary: formatDiff(classification.diff),
        });
        this.emit({ type: 'fact_stored', fact, kind: 'update', timestamp: this.config.now() });
        return { conceptKey: candidate.conceptKey, kind: 'update', factId: fact.id, degraded: false };
      }

      case 'new': {
        let fact: Fact;
        if (existing) {
          // Keep both statements under the single active fact of the concept
          fact = await this.replace(existing.id, {
            content: `${existing.content}\n${candidate.content}`,
            changeSummary: formatDiff({ removed: [], added: splitSentences(candidate.content) }),
          });
        } else {
          const now = this.config.now();
          fact = await factStore.upsert({ conceptKey: candidate.conceptKey, content: candidate.content }, (tx, written) =>
            this.deps.reviewQueue.trackWithin(tx, written, now)
          );
        }
        this.emit({ type: 'fact_stored', fact, kind: 'new', timestamp: this.config.now() });
        return {
          conceptKey: candidate.conceptKey,
          kind: 'new',
          factId: fact.id,
          degraded: classification.degraded,
        };
      }
    }
  }

  /**
   * Supersedes an active fact and moves scheduling to the new version in the
   * same transaction.
   */
  private async replace(oldId: string, revision: { content: string; changeSummary: string }): Promise<Fact> {
    const now = this.config.now();
    return this.deps.factStore.supersede(oldId, revision, (tx, fact) =>
      this.deps.reviewQueue.handOverWithin(tx, oldId, fact, now)
    );
  }

  // ===========================================================================
  // Test mode
  // ===========================================================================

  /**
   * Active facts due for review now, most overdue first.
   */
  async dueFacts(limit: number): Promise<Fact[]> {
    return this.deps.reviewQueue.nextDueFacts(this.config.now(), limit);
  }

  /**
   * Asks the collaborator for a question about `fact`. A collaborator
   * failure skips the fact instead of failing the turn; the skipped result
   * carries the error so the caller can tell an outage from bad credentials.
   */
  async askQuestion(fact: Fact): Promise<TurnResult<QuestionResult>> {
    return this.runTurn('question', async () => {
      try {
        const question = await this.deps.collaborator.generateQuestion(fact, { signal: this.config.signal });
        return { skipped: false, question };
      } catch (error) {
        if (!(error instanceof CollaboratorError)) {
          throw error;
        }
        this.degraded(error);
        return { skipped: true, reason: error.reason, error };
      }
    });
  }

  /**
   * Grades the learner's answer and records the outcome.
   *
   * If grading fails nothing is recorded and the result is skipped. If the
   * fact was superseded since the question was asked, the outcome is
   * recorded against the concept's current active fact.
   */
  async answer(fact: Fact, question: string, answerText: string, latencyMs: number): Promise<TurnResult<AnswerResult>> {
    return this.runTurn('answer', async () => {
      let grade: GradeResult;
      try {
        grade = await this.deps.collaborator.gradeAnswer(fact, question, answerText, { signal: this.config.signal });
      } catch (error) {
        if (!(error instanceof CollaboratorError)) {
          throw error;
        }
        this.degraded(error);
        return { skipped: true, reason: error.reason, error };
      }

      const { correct, feedback } = grade;
      const now = this.config.now();
      const reviewState = await this.withRetry(fact.conceptKey, async (isRetry) => {
        if (!isRetry) {
          return this.deps.reviewQueue.recordOutcome(fact.id, correct, latencyMs, now);
        }
        const active = await this.deps.factStore.getActive(fact.conceptKey);
        if (!active) {
          throw new UnknownFactError(fact.id);
        }
        await this.deps.reviewQueue.track(active, now);
        return this.deps.reviewQueue.recordOutcome(active.id, correct, latencyMs, now);
      });

      this.emit({ type: 'outcome_recorded', factId: reviewState.factId, reviewState, timestamp: now });
      return { skipped: false, correct, feedback, reviewState };
    });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async runTurn<T>(name: string, turn: () => Promise<T>): Promise<TurnResult<T>> {
    try {
      return { ok: true, value: await turn() };
    } catch (error) {
      const failure = toError(error);
      console.error(`[TutorSession] ${name} turn failed: ${failure.message}`);
      return { ok: false, error: failure };
    }
  }

  /**
   * Runs `operation`, and once more after an UnknownFactError or
   * ConflictError. The operation must reread whatever state it depends on.
   */
  private async withRetry<T>(conceptKey: string, operation: (isRetry: boolean) => Promise<T>): Promise<T> {
    try {
      return await operation(false);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      console.warn(`[TutorSession] ${error.name} on '${conceptKey}', rereading and retrying once`);
      return operation(true);
    }
  }

  private degraded(error: CollaboratorError): void {
    console.warn(`[TutorSession] ${error.task} degraded: ${error.reason}`);
    this.emit({ type: 'step_degraded', task: error.task, reason: error.reason, timestamp: this.config.now() });
  }

  private emit(event: SessionEvent): void {
    if (this.eventListener) {
      this.eventListener(event);
    }
  }
}
