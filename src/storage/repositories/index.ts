/**
 * Repository Layer - Barrel Export
 *
 * Re-exports the repository classes and their input types. Business logic
 * works with the domain models from `@/core/models`; the repositories own
 * the mapping to and from database rows.
 *
 * @example
 * ```typescript
 * import {
 *   FactRepository,
 *   ReviewStateRepository,
 *   InteractionRepository,
 * } from '@/storage/repositories';
 *
 * const factStore = new FactRepository(db);
 * const reviewStates = new ReviewStateRepository(db);
 * const interactions = new InteractionRepository(db);
 * ```
 */

// Base repository interface
export type { Repository } from './base';

// Fact store and types
export {
  FactRepository,
  FactHistory,
  mapFactRow,
  type FactStore,
  type FactRevision,
  type FactWriteHook,
  type UpsertFactInput,
} from './fact.repository';

// Review state repository and types
export { ReviewStateRepository, type ScheduledFact } from './review-state.repository';

// Interaction log repository and types
export { InteractionRepository, type CreateInteractionInput } from './interaction.repository';
