/**
 * Scheduler Types
 *
 * Tuning parameters for the ease-factor scheduler.
 */

import type { ReviewStage } from '../models';

/**
 * Configuration options for the Scheduler.
 */
export interface SchedulerConfig {
  /**
   * Consecutive correct answers needed to leave LEARNING.
   * Default: 2
   */
  graduationThreshold: number;

  /**
   * Ease factor of a fact that has never been tested.
   * Default: 1.3
   */
  initialEaseFactor: number;

  /** Lower bound of the ease factor. Default: 1.3 */
  minEaseFactor: number;

  /** Upper bound of the ease factor. Default: 2.5 */
  maxEaseFactor: number;

  /**
   * Added to the ease factor on a correct answer given faster than
   * `fastLatencyMs`. Default: 0.15
   */
  fastCorrectBonus: number;

  /** Subtracted from the ease factor on an incorrect answer. Default: 0.2 */
  incorrectPenalty: number;

  /** Answers faster than this count as fluent recall. Default: 10 000 ms */
  fastLatencyMs: number;

  /**
   * Interval used while learning and after every incorrect answer.
   * Default: 1 day
   */
  minimalIntervalDays: number;

  /**
   * Interval beyond which a reviewed fact can become mastered; also the
   * interval at which strength reaches 1. Default: 90 days
   */
  masteryIntervalDays: number;

  /**
   * Number of most recent outcomes that must all be correct for mastery.
   * Default: 3
   */
  masteryStreak: number;

  /**
   * Caps how far into the future a review can be scheduled.
   * Default: 365 days
   */
  maximumIntervalDays: number;

  /**
   * Most recent outcomes kept on a review state; older ones are dropped.
   * Never fewer than `masteryStreak`. Default: 20
   */
  outcomeHistoryLimit: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  graduationThreshold: 2,
  initialEaseFactor: 1.3,
  minEaseFactor: 1.3,
  maxEaseFactor: 2.5,
  fastCorrectBonus: 0.15,
  incorrectPenalty: 0.2,
  fastLatencyMs: 10_000,
  minimalIntervalDays: 1,
  masteryIntervalDays: 90,
  masteryStreak: 3,
  maximumIntervalDays: 365,
  outcomeHistoryLimit: 20,
};

/**
 * Counts reported by `ReviewQueue.summarize`.
 */
export interface ReviewSummary {
  byStage: Record<ReviewStage, number>;
  total: number;
  due: number;
}
