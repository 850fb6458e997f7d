/**
 * Review Queue
 *
 * Connects the pure Scheduler to persisted review states. This is the only
 * place a ReviewState is written after it was created, and it is written
 * only after a test outcome has been recorded. States of newly stored facts
 * are written by `trackWithin` and `handOverWithin` inside the fact store's
 * own transaction.
 */

import type { Fact, ReviewState } from '../models';
import { UnknownFactError } from '../errors';
import type { AppTransaction } from '../../storage/db';
import type { ReviewStateRepository } from '../../storage/repositories/review-state.repository';
import { Scheduler } from './scheduler';
import type { ReviewSummary } from './types';

/**
 * @example
 * ```typescript
 * const queue = new ReviewQueue(new ReviewStateRepository(db));
 *
 * await queue.track(fact);
 * const [next] = await queue.nextDueFacts(new Date(), 1);
 * await queue.recordOutcome(next.id, true, 4200);
 * ```
 */
export class ReviewQueue {
  constructor(
    private readonly reviewStates: ReviewStateRepository,
    private readonly scheduler: Scheduler = new Scheduler()
  ) {}

  /**
   * Active facts due at `now`: most overdue first, then weakest first, then
   * by fact id.
   */
  async nextDueFacts(now: Date = new Date(), limit: number = 10): Promise<Fact[]> {
    if (limit <= 0) {
      return [];
    }
    const scheduled = await this.reviewStates.findDue(now, limit);
    return scheduled.map((entry) => entry.fact);
  }

  /**
   * Records a test outcome and persists the rescheduled state.
   *
   * @throws {UnknownFactError} if the fact has no review state
   */
  async recordOutcome(
    factId: string,
    correct: boolean,
    latencyMs: number,
    now: Date = new Date()
  ): Promise<ReviewState> {
    const current = await this.reviewStates.findById(factId);
    if (!current) {
      throw new UnknownFactError(factId);
    }

    const next = this.scheduler.applyOutcome(current, { correct, latencyMs }, now);
    return this.reviewStates.save(next);
  }

  /**
   * Starts scheduling a newly active fact. Tracking a fact twice keeps the
   * existing state.
   */
  async track(fact: Fact, now: Date = new Date()): Promise<ReviewState> {
    const existing = await this.reviewStates.findById(fact.id);
    if (existing) {
      return existing;
    }
    return this.reviewStates.create(this.scheduler.createInitialState(fact.id, now));
  }

  /**
   * Starts scheduling `fact` inside the transaction that wrote it.
   */
  trackWithin(tx: AppTransaction, fact: Fact, now: Date): void {
    this.reviewStates.createWithin(tx, this.scheduler.createInitialState(fact.id, now));
  }

  /**
   * Moves scheduling from the superseded `oldId` to its successor inside the
   * transaction that superseded it. The successor starts over as NEW.
   */
  handOverWithin(tx: AppTransaction, oldId: string, fact: Fact, now: Date): void {
    this.reviewStates.deleteWithin(tx, oldId);
    this.trackWithin(tx, fact, now);
  }

  async getReviewState(factId: string): Promise<ReviewState | null> {
    return this.reviewStates.findById(factId);
  }

  async summarize(now: Date = new Date()): Promise<ReviewSummary> {
    const byStage = await this.reviewStates.countByStage();
    const due = await this.reviewStates.countDue(now);
    const total = byStage.new + byStage.learning + byStage.review + byStage.mastered;
    return { byStage, total, due };
  }
}
