/**
 * Scheduler - Ease-Factor Spaced Repetition
 *
 * Pure state transitions for a fact's ReviewState. The scheduler never
 * touches storage; `ReviewQueue` loads a state, passes it through
 * `applyOutcome` and saves the result.
 *
 * Stages move NEW → LEARNING on the first attempt, LEARNING → REVIEW once
 * `graduationThreshold` answers in a row were correct, and REVIEW →
 * MASTERED once the interval passes `masteryIntervalDays` on a streak of
 * correct answers. An incorrect answer from any stage goes back to
 * LEARNING with the minimal interval.
 *
 * Each correct answer in REVIEW or MASTERED multiplies the interval by the
 * ease factor. Fast correct answers raise the ease factor and incorrect
 * answers lower it, within `[minEaseFactor, maxEaseFactor]`.
 */

import type { ReviewOutcome, ReviewStage, ReviewState } from '../models';
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from './types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * @example
 * ```typescript
 * const scheduler = new Scheduler();
 *
 * let state = scheduler.createInitialState('fact_1', new Date());
 * state = scheduler.applyOutcome(state, { correct: false, latencyMs: 20000 }, new Date());
 * // state.stage === 'learning', state.intervalDays === 1
 * ```
 */
export class Scheduler {
  private readonly config: SchedulerConfig;

  constructor(config: Partial<SchedulerConfig> = {}) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
  }

  /**
   * State of a fact that has never been tested: due immediately.
   */
  createInitialState(factId: string, now: Date = new Date()): ReviewState {
    return {
      factId,
      stage: 'new',
      strength: 0,
      easeFactor: this.config.initialEaseFactor,
      intervalDays: 0,
      dueAt: new Date(now.getTime()),
      lastTestedAt: null,
      consecutiveCorrect: 0,
      outcomes: [],
    };
  }

  /**
   * Applies one test outcome and returns the next state. The input state is
   * not modified.
   *
   * @throws {RangeError} if `latencyMs` is negative or not a finite number
   */
  applyOutcome(
    state: ReviewState,
    result: { correct: boolean; latencyMs: number },
    now: Date = new Date()
  ): ReviewState {
    if (!Number.isFinite(result.latencyMs) || result.latencyMs < 0) {
      throw new RangeError(`latencyMs must be a non-negative number, got ${result.latencyMs}`);
    }

    const outcome: ReviewOutcome = {
      timestamp: new Date(now.getTime()),
      correct: result.correct,
      latencyMs: result.latencyMs,
    };
    const keep = Math.max(this.config.outcomeHistoryLimit, this.config.masteryStreak);
    const outcomes = [...state.outcomes, outcome].slice(-keep);
    const easeFactor = this.nextEaseFactor(state.easeFactor, result);

    let stage: ReviewStage;
    let intervalDays: number;
    let consecutiveCorrect: number;

    if (!result.correct) {
      stage = 'learning';
      intervalDays = this.config.minimalIntervalDays;
      consecutiveCorrect = 0;
    } else if (state.stage === 'new' || state.stage === 'learning') {
      consecutiveCorrect = state.consecutiveCorrect + 1;
      const base = Math.max(state.intervalDays, this.config.minimalIntervalDays);
      if (consecutiveCorrect >= this.config.graduationThreshold) {
        stage = 'review';
        intervalDays = this.capInterval(base * easeFactor);
      } else {
        stage = 'learning';
        intervalDays = base;
      }
    } else {
      consecutiveCorrect = state.consecutiveCorrect + 1;
      intervalDays = this.capInterval(state.intervalDays * easeFactor);
      stage = this.reachedMastery(intervalDays, outcomes) ? 'mastered' : state.stage;
    }

    return {
      factId: state.factId,
      stage,
      strength: this.strength(intervalDays),
      easeFactor,
      intervalDays,
      dueAt: new Date(now.getTime() + Math.round(intervalDays * MS_PER_DAY)),
      lastTestedAt: outcome.timestamp,
      consecutiveCorrect,
      outcomes,
    };
  }

  /**
   * Whether a state is due for review at `now`.
   */
  isDue(state: ReviewState, now: Date = new Date()): boolean {
    return state.dueAt.getTime() <= now.getTime();
  }

  /**
   * Memory strength for an interval: 0 when untested, 1 at the mastery
   * interval and beyond.
   */
  strength(intervalDays: number): number {
    return Math.min(1, intervalDays / this.config.masteryIntervalDays);
  }

  getConfig(): Readonly<SchedulerConfig> {
    return this.config;
  }

  private nextEaseFactor(current: number, result: { correct: boolean; latencyMs: number }): number {
    let next = current;
    if (!result.correct) {
      next -= this.config.incorrectPenalty;
    } else if (result.latencyMs < this.config.fastLatencyMs) {
      next += this.config.fastCorrectBonus;
    }
    return clamp(next, this.config.minEaseFactor, this.config.maxEaseFactor);
  }

  private capInterval(intervalDays: number): number {
    return Math.min(intervalDays, this.config.maximumIntervalDays);
  }

  private reachedMastery(intervalDays: number, outcomes: ReviewOutcome[]): boolean {
    if (intervalDays <= this.config.masteryIntervalDays) {
      return false;
    }
    const recent = outcomes.slice(-this.config.masteryStreak);
    return recent.length === this.config.masteryStreak && recent.every((o) => o.correct);
  }
}
