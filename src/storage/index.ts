/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { createDatabase, UserRepository } from '@/storage';
 *   const db = createDatabase(':memory:');
 *   const users = new UserRepository(db);
 */

export { createDatabase } from './db';
export type { AppDatabase } from './db';
export { applyMigrations, MIGRATIONS_FOLDER } from './migrate';

export { users, sessionHistories } from './schema';
export type { UserRow, NewUserRow, SessionHistoryRow, NewSessionHistoryRow } from './schema';

export * from './repositories';
