/**
 * Dedup/Merge Engine Types
 */

/**
 * Sentences that differ between the stored content and a candidate.
 */
export interface FactDiff {
  removed: string[];
  added: string[];
}

/**
 * Decision for one candidate fact.
 *
 * - 'new': keep the candidate. `degraded` is set when the collaborator
 *   failed and the engine fell back to retaining it.
 * - 'duplicate': nothing to store; `factId` is the matching active fact.
 * - 'update': the candidate contradicts `factId` and should supersede it.
 */
export type Classification =
  | { kind: 'new'; degraded: boolean }
  | { kind: 'duplicate'; factId: string }
  | { kind: 'update'; factId: string; diff: FactDiff };

export type ClassificationKind = Classification['kind'];

export interface DedupConfig {
  /** Similarity below this is a different statement. Default: 0.5 */
  newThreshold: number;
  /** Similarity at or above this, without contradiction, is a repeat. Default: 0.9 */
  duplicateThreshold: number;
}

export const DEFAULT_DEDUP_CONFIG: DedupConfig = {
  newThreshold: 0.5,
  duplicateThreshold: 0.9,
};
