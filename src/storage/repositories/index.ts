/**
 * Repository Layer - Barrel Export
 *
 * Drizzle-backed implementations of the core's persistence contracts.
 *
 * @example
 * ```typescript
 * import { UserRepository, SessionHistoryRepository } from '@/storage/repositories';
 *
 * const userStore = new UserRepository(db);
 * const sessionStore = new SessionHistoryRepository(db);
 * ```
 */

export { UserRepository } from './user.repository';
export {
  SessionHistoryRepository,
  type SessionHistorySummary,
} from './session-history.repository';
