/**
 * Dedup/Merge Engine
 *
 * Decides whether a candidate fact is new, repeats the active fact for its
 * concept, or contradicts it. Exact repeats are caught locally, before any
 * collaborator call, so classifying the same text twice always yields
 * DUPLICATE. Everything else is judged by the collaborator:
 *
 *   similarity < newThreshold            → NEW
 *   contradiction                        → UPDATE
 *   similarity ≥ duplicateThreshold      → DUPLICATE
 *   otherwise                            → NEW (a consistent elaboration)
 *
 * The engine fails open: when the collaborator is unavailable the candidate
 * is kept as NEW and flagged `degraded`.
 */

import type { Fact } from '../models';
import { CollaboratorError } from '../errors';
import type { CollaboratorCallOptions, TutorCollaborator } from '../../llm/types';
import { diffSentences, normalizeText } from './diff';
import { DEFAULT_DEDUP_CONFIG, type Classification, type DedupConfig } from './types';

/**
 * @example
 * ```typescript
 * const engine = new DedupEngine(collaborator);
 * const active = await factStore.getActive('variance');
 * const result = await engine.classify('Variance is the squared SD.', 'variance', active);
 * ```
 */
export class DedupEngine {
  private readonly config: DedupConfig;

  constructor(
    private readonly collaborator: TutorCollaborator,
    config: Partial<DedupConfig> = {}
  ) {
    this.config = { ...DEFAULT_DEDUP_CONFIG, ...config };
    if (this.config.newThreshold > this.config.duplicateThreshold) {
      throw new RangeError(
        `newThreshold (${this.config.newThreshold}) must not exceed duplicateThreshold (${this.config.duplicateThreshold})`
      );
    }
  }

  /**
   * Classifies `candidateText` against the active fact of `conceptKey`.
   *
   * @param existing - The active fact for the concept, or null if none
   */
  async classify(
    candidateText: string,
    conceptKey: string,
    existing: Fact | null,
    options: CollaboratorCallOptions = {}
  ): Promise<Classification> {
    if (!existing || existing.conceptKey !== conceptKey) {
      return { kind: 'new', degraded: false };
    }

    if (normalizeText(candidateText) === normalizeText(existing.content)) {
      return { kind: 'duplicate', factId: existing.id };
    }

    try {
      const similarity = await this.collaborator.scoreSimilarity(existing.content, candidateText, options);
      if (similarity < this.config.newThreshold) {
        return { kind: 'new', degraded: false };
      }

      const contradicts = await this.collaborator.detectContradiction(existing.content, candidateText, options);
      if (contradicts) {
        return { kind: 'update', factId: existing.id, diff: diffSentences(existing.content, candidateText) };
      }

      if (similarity >= this.config.duplicateThreshold) {
        return { kind: 'duplicate', factId: existing.id };
      }
      return { kind: 'new', degraded: false };
    } catch (error) {
      if (error instanceof CollaboratorError) {
        console.warn(
          `[DedupEngine] ${error.task} unavailable for '${conceptKey}', keeping candidate as new: ${error.reason}`
        );
        return { kind: 'new', degraded: true };
      }
      throw error;
    }
  }
}
