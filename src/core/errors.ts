/**
 * Domain Errors
 *
 * Typed errors raised by the fact store, the scheduler and the collaborator
 * adapter. The session orchestrator branches on these classes to decide
 * whether a turn can be retried (`UnknownFactError`, `ConflictError`),
 * degraded (`CollaboratorError`) or must be aborted (anything else).
 */

import type { CollaboratorTask } from '../llm/types';

/**
 * Base class for all tutor domain errors.
 */
export class TutorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TutorError';
  }
}

/**
 * Raised when a fact id has no fact or no review state behind it.
 */
export class UnknownFactError extends TutorError {
  readonly factId: string;

  constructor(factId: string) {
    super(`Fact '${factId}' not found`);
    this.name = 'UnknownFactError';
    this.factId = factId;
  }
}

/**
 * Raised when a write would violate the one-active-fact-per-concept rule or
 * was computed against a stale version. Callers reread and reapply.
 */
export class ConflictError extends TutorError {
  readonly conceptKey: string;

  constructor(conceptKey: string, detail: string) {
    super(`Conflicting write for concept '${conceptKey}': ${detail}`);
    this.name = 'ConflictError';
    this.conceptKey = conceptKey;
  }
}

/**
 * Raised by the LLM collaborator when it is unreachable, times out, is
 * aborted, or returns something that cannot be parsed for the task.
 */
export class CollaboratorError extends TutorError {
  readonly task: CollaboratorTask;
  readonly reason: string;

  constructor(task: CollaboratorTask, reason: string, options?: { cause?: unknown }) {
    super(`Collaborator task '${task}' failed: ${reason}`);
    this.name = 'CollaboratorError';
    this.task = task;
    this.reason = reason;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
