/**
 * Database Schema Definitions for the Statistics Tutor
 *
 * Drizzle ORM table definitions for SQLite. `drizzle-kit generate` derives
 * the migrations in `drizzle/` from these definitions, and `migrateDatabase`
 * applies them.
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
  type AnySQLiteColumn,
} from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

/**
 * Facts Table
 *
 * Every version of every fact. A fact is active while `superseded_by` is
 * null; the partial unique index keeps a single active row per concept key.
 * `superseded_by` references the newer row, which a supersede inserts after
 * marking the old one, so that transaction defers foreign key checks.
 */
export const facts = sqliteTable(
  'facts',
  {
    // Unique identifier for the fact version ('fact_' + UUID)
    id: text('id').primaryKey(),

    // Normalized topic identifier, e.g. 'mean_vs_median'
    conceptKey: text('concept_key').notNull(),

    // The statement the learner should remember
    content: text('content').notNull(),

    // Monotonic version within the concept key
    version: integer('version').notNull(),

    // Id of the newer version, null while this version is active
    supersededBy: text('superseded_by').references((): AnySQLiteColumn => facts.id),

    // Audit diff against the previous version
    changeSummary: text('change_summary'),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    uniqueIndex('facts_concept_version_idx').on(table.conceptKey, table.version),
    uniqueIndex('facts_active_concept_idx')
      .on(table.conceptKey)
      .where(sql`${table.supersededBy} IS NULL`),
  ]
);

/**
 * Review States Table
 *
 * Spaced-repetition state for each active fact (one row per fact id).
 * Outcomes are kept as a JSON array, oldest first.
 */
export const reviewStates = sqliteTable(
  'review_states',
  {
    factId: text('fact_id')
      .primaryKey()
      .references(() => facts.id),

    stage: text('stage', { enum: ['new', 'learning', 'review', 'mastered'] })
      .notNull()
      .default('new'),

    // Interval relative to the mastery interval, 0..1
    strength: real('strength').notNull().default(0),

    easeFactor: real('ease_factor').notNull(),

    intervalDays: real('interval_days').notNull().default(0),

    dueAt: integer('due_at', { mode: 'timestamp_ms' }).notNull(),

    lastTestedAt: integer('last_tested_at', { mode: 'timestamp_ms' }),

    consecutiveCorrect: integer('consecutive_correct').notNull().default(0),

    outcomes: text('outcomes', { mode: 'json' })
      .$type<Array<{ timestamp: number; correct: boolean; latencyMs: number }>>()
      .notNull()
      .default([]),
  },
  (table) => [index('review_states_due_at_idx').on(table.dueAt)]
);

/**
 * Interactions Table
 *
 * Append-only log of tutor and learner utterances.
 */
export const interactions = sqliteTable(
  'interactions',
  {
    id: text('id').primaryKey(),

    timestamp: integer('timestamp', { mode: 'timestamp_ms' }).notNull(),

    role: text('role', { enum: ['tutor', 'learner'] }).notNull(),

    text: text('text').notNull(),

    // Fact ids produced or confirmed by this interaction
    derivedFactIds: text('derived_fact_ids', { mode: 'json' })
      .$type<string[]>()
      .notNull()
      .default([]),
  },
  (table) => [index('interactions_timestamp_idx').on(table.timestamp)]
);

export type FactRow = typeof facts.$inferSelect;
export type NewFactRow = typeof facts.$inferInsert;

export type ReviewStateRow = typeof reviewStates.$inferSelect;
export type NewReviewStateRow = typeof reviewStates.$inferInsert;

export type InteractionRow = typeof interactions.$inferSelect;
export type NewInteractionRow = typeof interactions.$inferInsert;
