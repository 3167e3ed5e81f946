/**
 * Database Connection Factory
 *
 * Opens a better-sqlite3 connection, brings its schema up to date and wraps
 * it with Drizzle ORM.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *   const db = createDatabase(config.database.path);
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { applyMigrations } from './migrate';
import * as schema from './schema';

/**
 * Creates a Drizzle ORM database instance connected to the given SQLite file.
 *
 * @param dbPath - Path to the SQLite database file. Use ':memory:' for an
 *                 in-memory database (useful for testing).
 *
 * @example
 * const db = createDatabase('/var/data/debug-mentor.db');
 */
export function createDatabase(dbPath: string = 'debug-mentor.db') {
  const sqlite = new Database(dbPath);

  // WAL keeps readers off the writer's back; meaningless for :memory:
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  applyMigrations(sqlite);

  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countUsers(database: AppDatabase) {
 *   return database.select().from(users);
 * }
 */
export type AppDatabase = ReturnType<typeof createDatabase>;
