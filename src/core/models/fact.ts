/**
 * Fact Domain Types
 *
 * A Fact is one atomic piece of statistics knowledge the learner has been
 * taught, e.g. "The median is the middle value of an ordered data set".
 * Facts are grouped by a normalized concept key and versioned: a correction
 * never edits a fact in place, it supersedes it with a new version so the
 * full history of what was taught stays auditable.
 *
 * Invariant: at most one active (non-superseded) fact exists per concept key.
 */

/**
 * A single version of a fact about a concept.
 *
 * @example
 * ```typescript
 * const fact: Fact = {
 *   id: 'fact_6f1c…',
 *   conceptKey: 'mean_vs_median',
 *   content: 'The median is less affected by outliers than the mean.',
 *   version: 2,
 *   supersededBy: null,
 *   changeSummary: '- The mean is less affected by outliers.\n+ The median is less affected by outliers than the mean.',
 *   createdAt: new Date('2024-03-01T09:00:00Z'),
 *   updatedAt: new Date('2024-03-01T09:00:00Z'),
 * };
 * ```
 */
export interface Fact {
  /** Stable identifier, prefixed with `fact_` */
  id: string;

  /** Normalized topic identifier shared by every version of this fact */
  conceptKey: string;

  /** The statement to remember */
  content: string;

  /** Monotonic version counter within the concept key, starting at 1 */
  version: number;

  /** Id of the version that replaced this one, or null while active */
  supersededBy: string | null;

  /** Audit diff against the previous version, null for a first version */
  changeSummary: string | null;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * Input for writing a fact that does not exist yet.
 * Version and timestamps are assigned by the store.
 */
export interface NewFact {
  id?: string;
  conceptKey: string;
  content: string;
  changeSummary?: string | null;
}

/**
 * Whether a fact is the active version of its concept.
 */
export function isActive(fact: Fact): boolean {
  return fact.supersededBy === null;
}

/**
 * Normalizes a free-form topic label into a concept key.
 *
 * Lower-cases, collapses every run of non-alphanumeric characters into a
 * single underscore and trims underscores from both ends.
 *
 * @example
 * normalizeConceptKey('Mean vs. Median'); // 'mean_vs_median'
 * normalizeConceptKey('  Standard Deviation '); // 'standard_deviation'
 */
export function normalizeConceptKey(label: string): string {
  return label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}
