/**
 * Core Domain Models - Barrel Export
 *
 * Types shared by the fact store, the scheduler, the dedup engine and the
 * session orchestrator.
 *
 * @example
 * ```typescript
 * import type { Fact, ReviewState, Interaction } from '@/core/models';
 * ```
 */

// Fact types - versioned knowledge items keyed by concept
export type { Fact, NewFact } from './fact';
export { isActive, normalizeConceptKey } from './fact';

// ReviewState types - spaced-repetition bookkeeping per active fact
export type { ReviewStage, ReviewOutcome, ReviewState } from './review-state';

// Interaction types - append-only conversation log
export type { InteractionRole, Interaction } from './interaction';
