/**
 * ReviewState Domain Types
 *
 * Spaced-repetition bookkeeping for one active fact. A review state is
 * created with each new active fact and only the scheduler mutates it, after
 * a test outcome has been recorded.
 *
 * Invariant: `dueAt >= lastTestedAt` whenever `lastTestedAt` is set.
 */

/**
 * Where a fact is in the learning process.
 *
 * - 'new': never tested
 * - 'learning': tested, not yet answered correctly enough times in a row
 * - 'review': graduated; intervals grow by the ease factor
 * - 'mastered': long interval reached with a streak of correct answers
 */
export type ReviewStage = 'new' | 'learning' | 'review' | 'mastered';

/**
 * One recorded test attempt.
 */
export interface ReviewOutcome {
  timestamp: Date;
  correct: boolean;
  /** Time the learner took to answer, in milliseconds */
  latencyMs: number;
}

export interface ReviewState {
  factId: string;
  stage: ReviewStage;

  /**
   * Memory strength in [0, 1]: the current interval relative to the
   * mastery interval. Used to break ties when ordering due facts.
   */
  strength: number;

  /** Multiplier applied to the interval on each graduated correct answer */
  easeFactor: number;

  /** Current review interval in days (0 for a new fact) */
  intervalDays: number;

  dueAt: Date;
  lastTestedAt: Date | null;
  consecutiveCorrect: number;

  /** Chronological test attempts */
  outcomes: ReviewOutcome[];
}
