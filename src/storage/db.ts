/**
 * Database Connection Factory for the Statistics Tutor
 *
 * Opens SQLite through better-sqlite3 and wraps it with Drizzle ORM. The
 * connection enables foreign key enforcement and applies pending migrations
 * before it is handed out, so every caller sees the current schema.
 *
 * Usage:
 *   import { openDatabase } from '@/storage/db';
 *
 *   const { db, sqlite } = openDatabase();          // DATABASE_PATH or default file
 *   const { db: testDb } = openDatabase(':memory:'); // throwaway database for tests
 *   sqlite.close();
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { migrateDatabase } from './migrate';
import { getDatabasePath } from '../config';

/**
 * Type alias for the Drizzle database instance.
 *
 * Use this type when passing the database to repositories.
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * The handle passed to a `db.transaction` callback.
 */
export type AppTransaction = Parameters<Parameters<AppDatabase['transaction']>[0]>[0];

/**
 * A Drizzle instance together with the raw better-sqlite3 handle,
 * which callers need to close the file.
 */
export interface DatabaseConnection {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Opens (or creates) the SQLite database at `dbPath` and migrates it.
 *
 * @param dbPath - File path, or ':memory:' for an in-memory database.
 *                 Defaults to DATABASE_PATH / 'stats-tutor.db'.
 */
export function openDatabase(dbPath: string = getDatabasePath()): DatabaseConnection {
  const sqlite = new Database(dbPath);

  // SQLite ships with foreign keys disabled; review_states and the
  // superseded_by back-reference both rely on them
  sqlite.pragma('foreign_keys = ON');

  // WAL keeps readers consistent while a write transaction is open
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  const db = drizzle(sqlite, { schema });
  migrateDatabase(db);

  return { db, sqlite };
}
