/**
 * Fact Repository Implementation
 *
 * The durable fact store. Facts are versioned per concept key and never
 * deleted: a change of content supersedes the active version with a new one.
 * Every write for a concept key runs inside a single SQLite transaction, and
 * the partial unique index on `concept_key WHERE superseded_by IS NULL`
 * rejects any write that would leave two active facts for one key. Such
 * writes, and writes against an already superseded version, surface as
 * `ConflictError` so the caller can reread and reapply.
 */

import { and, asc, desc, eq, isNull, lt, max, sql } from 'drizzle-orm';
import type { AppDatabase, AppTransaction } from '../db';
import { facts, type FactRow } from '../schema';
import type { Fact, NewFact } from '@/core/models';
import { ConflictError, UnknownFactError } from '@/core/errors';
import { generateId } from '@/core/ids';
import type { Repository } from './base';

/** Number of versions fetched per query while iterating a history */
const HISTORY_PAGE_SIZE = 20;

/**
 * Input for `upsert`. Passing `version` turns on the optimistic check
 * against the stored version of the same id.
 */
export interface UpsertFactInput extends NewFact {
  version?: number;
}

/**
 * Content of the version that replaces an active fact.
 * The concept key is inherited from the fact being superseded.
 */
export interface FactRevision {
  id?: string;
  content: string;
  changeSummary?: string | null;
}

/**
 * Runs inside the transaction that wrote `fact`, after the row is written.
 * Throwing rolls the fact back with it.
 */
export type FactWriteHook = (tx: AppTransaction, fact: Fact) => void;

/**
 * Contract of the fact store used by the dedup engine and the orchestrator.
 */
export interface FactStore {
  upsert(input: UpsertFactInput, onWrite?: FactWriteHook): Promise<Fact>;
  getActive(conceptKey: string): Promise<Fact | null>;
  getById(id: string): Promise<Fact | null>;
  supersede(oldId: string, revision: FactRevision, onWrite?: FactWriteHook): Promise<Fact>;
  history(conceptKey: string): Iterable<Fact>;
  listActive(): Promise<Fact[]>;
}

/**
 * Maps a facts row to the Fact domain model.
 */
export function mapFactRow(row: FactRow): Fact {
  return {
    id: row.id,
    conceptKey: row.conceptKey,
    content: row.content,
    version: row.version,
    supersededBy: row.supersededBy,
    changeSummary: row.changeSummary,
    // Drizzle's timestamp_ms mode already returns Date objects
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * True for SQLite constraint violations, whether raised directly by
 * better-sqlite3 or wrapped by the ORM.
 */
function isConstraintViolation(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if ('code' in current && typeof current.code === 'string' && current.code.startsWith('SQLITE_CONSTRAINT')) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

/**
 * Lazy, restartable view over the versions of one concept, newest first.
 *
 * Nothing is read until iteration starts; each iteration re-queries the
 * database page by page, so a history can be walked again after new
 * versions were written and will include them.
 */
export class FactHistory implements Iterable<Fact> {
  constructor(
    private readonly db: AppDatabase,
    readonly conceptKey: string,
    private readonly pageSize: number = HISTORY_PAGE_SIZE
  ) {}

  *[Symbol.iterator](): Iterator<Fact> {
    let belowVersion = Number.MAX_SAFE_INTEGER;

    while (true) {
      const page = this.db
        .select()
        .from(facts)
        .where(and(eq(facts.conceptKey, this.conceptKey), lt(facts.version, belowVersion)))
        .orderBy(desc(facts.version))
        .limit(this.pageSize)
        .all();

      for (const row of page) {
        yield mapFactRow(row);
      }

      if (page.length < this.pageSize) {
        return;
      }
      belowVersion = page[page.length - 1].version;
    }
  }
}

/**
 * Repository for Fact data access operations.
 *
 * @example
 * ```typescript
 * const store = new FactRepository(db);
 *
 * const v1 = await store.upsert({ conceptKey: 'mean', content: 'The mean is the average.' });
 * const v2 = await store.supersede(v1.id, { content: 'The mean is the sum divided by the count.' });
 *
 * for (const version of store.history('mean')) {
 *   console.log(version.version, version.content); // 2 …, then 1 …
 * }
 * ```
 */
export class FactRepository implements FactStore, Repository<Fact, NewFact> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Fact | null> {
    const result = await this.db.select().from(facts).where(eq(facts.id, id)).limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapFactRow(result[0]);
  }

  async getById(id: string): Promise<Fact | null> {
    return this.findById(id);
  }

  /**
   * Retrieves every version of every fact, grouped by concept.
   */
  async findAll(): Promise<Fact[]> {
    const results = await this.db
      .select()
      .from(facts)
      .orderBy(asc(facts.conceptKey), desc(facts.version));
    return results.map(mapFactRow);
  }

  async create(input: NewFact): Promise<Fact> {
    return this.upsert(input);
  }

  /**
   * Returns the active version for a concept key, or null.
   */
  async getActive(conceptKey: string): Promise<Fact | null> {
    const result = await this.db
      .select()
      .from(facts)
      .where(and(eq(facts.conceptKey, conceptKey), isNull(facts.supersededBy)))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapFactRow(result[0]);
  }

  /**
   * Retrieves the active version of every concept, ordered by concept key.
   */
  async listActive(): Promise<Fact[]> {
    const results = await this.db
      .select()
      .from(facts)
      .where(isNull(facts.supersededBy))
      .orderBy(asc(facts.conceptKey));
    return results.map(mapFactRow);
  }

  /**
   * Writes a fact.
   *
   * - Unknown id: inserted as the next version of its concept. Rejected with
   *   `ConflictError` if the concept already has an active fact.
   * - Known id: facts are immutable, so this only succeeds as a no-op when
   *   the content matches and the fact is still the expected, active
   *   version. Anything else is a `ConflictError`.
   *
   * `onWrite` runs only when a row is inserted.
   */
  async upsert(input: UpsertFactInput, onWrite?: FactWriteHook): Promise<Fact> {
    const id = input.id ?? generateId('fact');
    const now = new Date();

    try {
      return this.db.transaction((tx) => {
        const existing = tx.select().from(facts).where(eq(facts.id, id)).get();

        if (existing) {
          if (existing.conceptKey !== input.conceptKey) {
            throw new ConflictError(input.conceptKey, `fact '${id}' belongs to '${existing.conceptKey}'`);
          }
          if (existing.supersededBy !== null) {
            throw new ConflictError(input.conceptKey, `fact '${id}' was superseded by '${existing.supersededBy}'`);
          }
          if (input.version !== undefined && input.version !== existing.version) {
            throw new ConflictError(
              input.conceptKey,
              `stale version ${input.version}, stored version is ${existing.version}`
            );
          }
          if (existing.content !== input.content) {
            throw new ConflictError(input.conceptKey, `fact '${id}' is immutable; supersede it instead`);
          }
          return mapFactRow(existing);
        }

        const active = tx
          .select({ id: facts.id })
          .from(facts)
          .where(and(eq(facts.conceptKey, input.conceptKey), isNull(facts.supersededBy)))
          .get();
        if (active) {
          throw new ConflictError(input.conceptKey, `active fact '${active.id}' already exists`);
        }

        const latest = tx
          .select({ version: max(facts.version) })
          .from(facts)
          .where(eq(facts.conceptKey, input.conceptKey))
          .get();

        const row = tx
          .insert(facts)
          .values({
            id,
            conceptKey: input.conceptKey,
            content: input.content,
            version: (latest?.version ?? 0) + 1,
            supersededBy: null,
            changeSummary: input.changeSummary ?? null,
            createdAt: now,
            updatedAt: now,
          })
          .returning()
          .get();

        const fact = mapFactRow(row);
        onWrite?.(tx, fact);
        return fact;
      });
    } catch (error) {
      if (isConstraintViolation(error)) {
        throw new ConflictError(input.conceptKey, 'another writer stored an active fact first');
      }
      throw error;
    }
  }

  /**
   * Replaces the active fact `oldId` with a new version.
   *
   * The old row is marked superseded and the new row inserted in one
   * transaction, so readers see either the old or the new active version.
   * `onWrite` joins the same transaction.
   *
   * @throws {UnknownFactError} if `oldId` does not exist
   * @throws {ConflictError} if `oldId` is no longer the active version
   */
  async supersede(oldId: string, revision: FactRevision, onWrite?: FactWriteHook): Promise<Fact> {
    const newId = revision.id ?? generateId('fact');
    const now = new Date();
    let conceptKey = '';

    try {
      return this.db.transaction((tx) => {
        const old = tx.select().from(facts).where(eq(facts.id, oldId)).get();
        if (!old) {
          throw new UnknownFactError(oldId);
        }
        conceptKey = old.conceptKey;

        // superseded_by points at a row inserted below; checked at commit
        tx.run(sql`PRAGMA defer_foreign_keys = ON`);

        // Guarded update: only an active row can be superseded
        const marked = tx
          .update(facts)
          .set({ supersededBy: newId, updatedAt: now })
          .where(and(eq(facts.id, oldId), isNull(facts.supersededBy)))
          .run();
        if (marked.changes === 0) {
          throw new ConflictError(old.conceptKey, `fact '${oldId}' was already superseded`);
        }

        const row = tx
          .insert(facts)
          .values({
            id: newId,
            conceptKey: old.conceptKey,
            content: revision.content,
            version: old.version + 1,
            supersededBy: null,
            changeSummary: revision.changeSummary ?? null,
            createdAt: now,
            updatedAt: now,
          })
          .returning()
          .get();

        const fact = mapFactRow(row);
        onWrite?.(tx, fact);
        return fact;
      });
    } catch (error) {
      if (isConstraintViolation(error)) {
        throw new ConflictError(conceptKey, 'a newer version was written concurrently');
      }
      throw error;
    }
  }

  /**
   * Every version of a concept, newest first, read lazily.
   */
  history(conceptKey: string): FactHistory {
    return new FactHistory(this.db, conceptKey);
  }
}
