import { randomUUID } from 'node:crypto';

/**
 * Generates a unique ID with a prefix, e.g. `fact_0b6f…`.
 *
 * @param prefix - Entity prefix ('fact', 'int')
 */
export function generateId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}
