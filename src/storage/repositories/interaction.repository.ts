/**
 * Interaction Repository Implementation
 *
 * Append-only storage for the tutor/learner conversation log. There is no
 * update or delete: once written, an interaction is part of the audit trail
 * that explains where each fact came from.
 */

import { asc, desc, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { interactions, type InteractionRow } from '../schema';
import type { Interaction, InteractionRole } from '@/core/models';
import { generateId } from '@/core/ids';
import type { Repository } from './base';

/**
 * Input type for appending an interaction.
 */
export interface CreateInteractionInput {
  /** Unique identifier; generated ('int_' + UUID) when omitted */
  id?: string;
  role: InteractionRole;
  text: string;
  derivedFactIds?: string[];
  /** Defaults to the time of the write */
  timestamp?: Date;
}

// Insertion order breaks ties between interactions logged in the same millisecond
const insertionOrder = sql`rowid`;

function mapToDomain(row: InteractionRow): Interaction {
  return {
    id: row.id,
    timestamp: row.timestamp,
    role: row.role,
    text: row.text,
    derivedFactIds: row.derivedFactIds,
  };
}

/**
 * Repository for the Interaction log.
 *
 * @example
 * ```typescript
 * const log = new InteractionRepository(db);
 *
 * await log.create({ role: 'learner', text: 'What is a p-value?' });
 * const context = await log.findRecent(10);
 * ```
 */
export class InteractionRepository
  implements Repository<Interaction, CreateInteractionInput>
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Interaction | null> {
    const result = await this.db
      .select()
      .from(interactions)
      .where(eq(interactions.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Retrieves the whole log in chronological order.
   */
  async findAll(): Promise<Interaction[]> {
    const results = await this.db
      .select()
      .from(interactions)
      .orderBy(asc(interactions.timestamp), asc(insertionOrder));
    return results.map(mapToDomain);
  }

  /**
   * Appends an interaction to the log.
   */
  async create(input: CreateInteractionInput): Promise<Interaction> {
    const result = await this.db
      .insert(interactions)
      .values({
        id: input.id ?? generateId('int'),
        timestamp: input.timestamp ?? new Date(),
        role: input.role,
        text: input.text,
        derivedFactIds: input.derivedFactIds ?? [],
      })
      .returning();

    return mapToDomain(result[0]);
  }

  /**
   * The most recent `limit` interactions, returned oldest first so they can
   * be replayed as conversation context.
   */
  async findRecent(limit: number): Promise<Interaction[]> {
    const results = await this.db
      .select()
      .from(interactions)
      .orderBy(desc(interactions.timestamp), desc(insertionOrder))
      .limit(limit);

    return results.map(mapToDomain).reverse();
  }
}
