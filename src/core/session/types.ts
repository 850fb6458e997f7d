/**
 * Tutor Session Types
 *
 * Results, events and dependencies of the TutorSession orchestrator.
 *
 * 1. **Turn results**: every turn resolves to a `TurnResult`. A failed turn
 *    carries its error and leaves earlier durable state untouched.
 *
 * 2. **Events**: a single optional listener receives what happened to
 *    facts and review states during a turn, for display in the CLI.
 *
 * 3. **Dependencies**: the stores and services the orchestrator is built
 *    from, injectable so tests can supply fakes.
 */

import type { Fact, ReviewState } from '../models';
import type { CollaboratorError } from '../errors';
import type { ClassificationKind, DedupEngine } from '../dedup';
import type { ReviewQueue } from '../scheduler';
import type { CollaboratorTask, TutorCollaborator } from '../../llm/types';
import type { FactStore } from '../../storage/repositories/fact.repository';
import type { InteractionRepository } from '../../storage/repositories/interaction.repository';

/**
 * Outcome of one turn. Errors never escape a turn; they are returned here.
 */
export type TurnResult<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * What became of one candidate fact extracted from a learn exchange.
 */
export interface FactChange {
  conceptKey: string;
  kind: ClassificationKind;
  /** The fact written ('new'/'update') or matched ('duplicate') */
  factId: string;
  /** Set when the dedup engine could not consult the collaborator */
  degraded: boolean;
}

export interface TeachResult {
  reply: string;
  changes: FactChange[];
  /** True when fact extraction failed and nothing was learned from the exchange */
  extractionDegraded: boolean;
}

export type QuestionResult =
  | { skipped: false; question: string }
  | { skipped: true; reason: string; error: CollaboratorError };

export type AnswerResult =
  | { skipped: false; correct: boolean; feedback: string; reviewState: ReviewState }
  | { skipped: true; reason: string; error: CollaboratorError };

/**
 * Catalog of session events.
 */
export type SessionEvent =
  | { type: 'fact_stored'; fact: Fact; kind: 'new' | 'update'; timestamp: Date }
  | { type: 'fact_duplicate'; factId: string; conceptKey: string; timestamp: Date }
  | { type: 'outcome_recorded'; factId: string; reviewState: ReviewState; timestamp: Date }
  | { type: 'step_degraded'; task: CollaboratorTask; reason: string; timestamp: Date };

export type SessionEventType = SessionEvent['type'];

export type SessionEventListener = (event: SessionEvent) => void;

export interface TutorSessionDependencies {
  factStore: FactStore;
  reviewQueue: ReviewQueue;
  interactions: InteractionRepository;
  collaborator: TutorCollaborator;
  dedup: DedupEngine;
}

export interface TutorSessionConfig {
  /**
   * Number of past interactions sent as conversation context.
   * Default: 12
   */
  historyLimit: number;

  /** Clock used for scheduling; injectable for tests */
  now: () => Date;

  /** Cancels in-flight collaborator calls when signalled */
  signal?: AbortSignal;
}
