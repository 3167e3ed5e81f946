/**
 * Schema Migration Runner
 *
 * Applies the SQL files in ./migrations, in file-name order, to a SQLite
 * connection. Every statement is written with IF NOT EXISTS so running the
 * whole set again is safe; applied files are recorded in a `_migrations`
 * table so later files only run once.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';

/** Folder holding the *.sql migrations, resolved beside this module. */
export const MIGRATIONS_FOLDER = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

/**
 * Applies pending migrations and returns the names of the files it ran.
 */
export function applyMigrations(
  sqlite: Database.Database,
  migrationsFolder: string = MIGRATIONS_FOLDER
): string[] {
  sqlite.exec(
    'CREATE TABLE IF NOT EXISTS _migrations (name TEXT PRIMARY KEY NOT NULL, applied_at INTEGER NOT NULL)'
  );

  const applied = new Set(
    sqlite
      .prepare<[], { name: string }>('SELECT name FROM _migrations')
      .all()
      .map((row) => row.name)
  );

  const pending = readdirSync(migrationsFolder)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  const record = sqlite.prepare<[string, number]>(
    'INSERT INTO _migrations (name, applied_at) VALUES (?, ?)'
  );

  const run = sqlite.transaction((files: string[]) => {
    for (const file of files) {
      sqlite.exec(readFileSync(join(migrationsFolder, file), 'utf-8'));
      record.run(file, Date.now());
    }
  });
  run(pending);

  if (pending.length > 0) {
    console.log(`[migrate] Applied ${pending.length} migration(s): ${pending.join(', ')}`);
  }

  return pending;
}
