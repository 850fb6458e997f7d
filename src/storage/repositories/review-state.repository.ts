/**
 * ReviewState Repository Implementation
 *
 * Persists the scheduler's per-fact state. Outcomes are stored as a JSON
 * array with numeric timestamps and mapped back to `Date` objects in the
 * domain model.
 */

import { and, asc, count, eq, isNull, lte } from 'drizzle-orm';
import type { AppDatabase, AppTransaction } from '../db';
import { facts, reviewStates, type ReviewStateRow } from '../schema';
import type { Fact, ReviewOutcome, ReviewStage, ReviewState } from '@/core/models';
import { UnknownFactError } from '@/core/errors';
import type { Repository } from './base';
import { mapFactRow } from './fact.repository';

/**
 * An active fact joined with its review state.
 */
export interface ScheduledFact {
  fact: Fact;
  reviewState: ReviewState;
}

function mapToDomain(row: ReviewStateRow): ReviewState {
  const outcomes: ReviewOutcome[] = row.outcomes.map((outcome) => ({
    timestamp: new Date(outcome.timestamp),
    correct: outcome.correct,
    latencyMs: outcome.latencyMs,
  }));

  return {
    factId: row.factId,
    stage: row.stage,
    strength: row.strength,
    easeFactor: row.easeFactor,
    intervalDays: row.intervalDays,
    dueAt: row.dueAt,
    lastTestedAt: row.lastTestedAt,
    consecutiveCorrect: row.consecutiveCorrect,
    outcomes,
  };
}

function toRow(state: ReviewState): ReviewStateRow {
  return {
    factId: state.factId,
    stage: state.stage,
    strength: state.strength,
    easeFactor: state.easeFactor,
    intervalDays: state.intervalDays,
    dueAt: state.dueAt,
    lastTestedAt: state.lastTestedAt,
    consecutiveCorrect: state.consecutiveCorrect,
    outcomes: state.outcomes.map((outcome) => ({
      timestamp: outcome.timestamp.getTime(),
      correct: outcome.correct,
      latencyMs: outcome.latencyMs,
    })),
  };
}

/**
 * Repository for ReviewState data access operations.
 *
 * @example
 * ```typescript
 * const repo = new ReviewStateRepository(db);
 *
 * // Facts due now, most overdue first
 * const due = await repo.findDue(new Date(), 5);
 * ```
 */
export class ReviewStateRepository implements Repository<ReviewState, ReviewState> {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Retrieves the review state of a fact.
   *
   * @param factId - Id of the fact the state belongs to
   */
  async findById(factId: string): Promise<ReviewState | null> {
    const result = await this.db
      .select()
      .from(reviewStates)
      .where(eq(reviewStates.factId, factId))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  async findAll(): Promise<ReviewState[]> {
    const results = await this.db.select().from(reviewStates).orderBy(asc(reviewStates.dueAt));
    return results.map(mapToDomain);
  }

  async create(state: ReviewState): Promise<ReviewState> {
    const result = await this.db.insert(reviewStates).values(toRow(state)).returning();
    return mapToDomain(result[0]);
  }

  /**
   * Overwrites the stored state of `state.factId`.
   *
   * @throws {UnknownFactError} if the fact has no review state
   */
  async save(state: ReviewState): Promise<ReviewState> {
    const { factId, ...columns } = toRow(state);
    const result = await this.db
      .update(reviewStates)
      .set(columns)
      .where(eq(reviewStates.factId, factId))
      .returning();

    if (result.length === 0) {
      throw new UnknownFactError(factId);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Inserts `state` within `tx`, keeping the existing row if the fact is
   * already scheduled.
   */
  createWithin(tx: AppTransaction, state: ReviewState): void {
    tx.insert(reviewStates).values(toRow(state)).onConflictDoNothing().run();
  }

  /**
   * Drops the review state of a fact within `tx`.
   * Returns whether a row was removed.
   */
  deleteWithin(tx: AppTransaction, factId: string): boolean {
    return tx.delete(reviewStates).where(eq(reviewStates.factId, factId)).run().changes > 0;
  }

  /**
   * Active facts whose review is due at `asOf`.
   *
   * Ordered by overdue-ness (earliest due date first), then weakest
   * strength first, then fact id so the order is stable.
   */
  async findDue(asOf: Date, limit: number): Promise<ScheduledFact[]> {
    const rows = await this.db
      .select({ fact: facts, reviewState: reviewStates })
      .from(reviewStates)
      .innerJoin(facts, eq(reviewStates.factId, facts.id))
      .where(and(isNull(facts.supersededBy), lte(reviewStates.dueAt, asOf)))
      .orderBy(asc(reviewStates.dueAt), asc(reviewStates.strength), asc(reviewStates.factId))
      .limit(limit);

    return rows.map((row) => ({
      fact: mapFactRow(row.fact),
      reviewState: mapToDomain(row.reviewState),
    }));
  }

  /**
   * Number of active facts per review stage.
   */
  async countByStage(): Promise<Record<ReviewStage, number>> {
    const rows = await this.db
      .select({ stage: reviewStates.stage, total: count() })
      .from(reviewStates)
      .innerJoin(facts, eq(reviewStates.factId, facts.id))
      .where(isNull(facts.supersededBy))
      .groupBy(reviewStates.stage);

    const counts: Record<ReviewStage, number> = { new: 0, learning: 0, review: 0, mastered: 0 };
    for (const row of rows) {
      counts[row.stage] = row.total;
    }
    return counts;
  }

  /**
   * Number of active facts due at `asOf`; the same set `findDue` draws from.
   */
  async countDue(asOf: Date): Promise<number> {
    const rows = await this.db
      .select({ total: count() })
      .from(reviewStates)
      .innerJoin(facts, eq(reviewStates.factId, facts.id))
      .where(and(isNull(facts.supersededBy), lte(reviewStates.dueAt, asOf)));
    return rows[0]?.total ?? 0;
  }
}
