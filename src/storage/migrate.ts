/**
 * Database Migration Runner for the Statistics Tutor
 *
 * Applies the migrations in `drizzle/`, laid out the way drizzle-kit writes
 * them: `meta/_journal.json` plus one SQL file per entry. Drizzle records
 * applied migrations in `__drizzle_migrations`, so running the migrator
 * repeatedly only applies new ones.
 *
 * Usage:
 *   npm run db:generate   # after changing schema.ts
 *   npm run db:migrate
 */

import type Database from 'better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import { fileURLToPath } from 'node:url';
import type { AppDatabase } from './db';

/**
 * Location of the checked-in migrations, relative to this module.
 */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle', import.meta.url));

/**
 * Applies every pending migration in `migrationsFolder`.
 */
export function migrateDatabase(db: AppDatabase, migrationsFolder: string = MIGRATIONS_FOLDER): void {
  migrate(db, { migrationsFolder });
}

/**
 * Number of migrations recorded as applied.
 */
export function countAppliedMigrations(sqlite: Database.Database): number {
  const count = sqlite.prepare('SELECT count(*) FROM __drizzle_migrations').pluck().get();
  return typeof count === 'number' ? count : 0;
}

/**
 * Lists the application tables, excluding SQLite internals and Drizzle's
 * migration ledger. Used by the CLI `migrate` command for verification.
 */
export function listTables(sqlite: Database.Database): string[] {
  return sqlite
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' AND name != '__drizzle_migrations' ORDER BY name"
    )
    .pluck()
    .all()
    .filter((name): name is string => typeof name === 'string');
}
