/**
 * Drizzle Kit Configuration
 *
 * Used by drizzle-kit to generate migrations from schema changes and to run
 * Drizzle Studio against the local database.
 *
 * The schema is defined in src/storage/schema.ts
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',

  // Migrations land here and are applied by src/storage/migrate.ts
  out: './drizzle',

  dialect: 'sqlite',

  dbCredentials: {
    url: process.env.DATABASE_PATH || './stats-tutor.db',
  },

  verbose: true,

  // Require confirmation for destructive operations
  strict: true,
});
