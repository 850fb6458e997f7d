/**
 * Interaction Domain Types
 *
 * The append-only log of what was said during teach and test turns. Each
 * entry records which facts it produced, so every fact can be traced back to
 * the exchange it came from.
 */

export type InteractionRole = 'tutor' | 'learner';

export interface Interaction {
  id: string;
  timestamp: Date;
  role: InteractionRole;
  text: string;
  /** Facts created, updated or confirmed by this interaction */
  derivedFactIds: string[];
}
