/**
 * Storage Module - Barrel Export
 *
 * Public API of the storage module: the connection factory, the migrator,
 * table definitions and row types.
 *
 * Usage:
 *   import { openDatabase, facts } from '@/storage';
 *   const { db } = openDatabase();
 *   const rows = await db.select().from(facts);
 */

export { openDatabase } from './db';
export type { AppDatabase, AppTransaction, DatabaseConnection } from './db';
export { migrateDatabase, listTables, countAppliedMigrations, MIGRATIONS_FOLDER } from './migrate';

// Table definitions
export { facts, reviewStates, interactions } from './schema';

// Row types
export type {
  FactRow,
  NewFactRow,
  ReviewStateRow,
  InteractionRow,
} from './schema';

export * from './repositories';
