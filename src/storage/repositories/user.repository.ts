/**
 * User Repository Implementation
 *
 * Data access for learner preferences. Implements the core's UserStore
 * contract on top of Drizzle ORM; `save` is an upsert keyed on the user id.
 */

import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { users } from '../schema';
import type { User } from '@/core/models';
import type { UserStore } from '@/core/gateway';

/**
 * Maps a database row to a User domain model.
 * Drizzle's timestamp_ms mode already returns Date objects.
 */
function mapToDomain(row: typeof users.$inferSelect): User {
  return {
    id: row.id,
    learningStyle: row.learningStyle,
    mode: row.mode,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Repository for User data access operations.
 *
 * @example
 * ```typescript
 * const repo = new UserRepository(db);
 * await repo.save({ ...user, learningStyle: 'Visual', updatedAt: new Date() });
 * const found = await repo.findById('user_42');
 * ```
 */
export class UserRepository implements UserStore {
  constructor(private readonly db: AppDatabase) {}

  async findById(userId: string): Promise<User | null> {
    const result = await this.db.select().from(users).where(eq(users.id, userId)).limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Inserts the user, or overwrites preferences and updatedAt when a row
   * exists. The original createdAt is kept.
   */
  async save(user: User): Promise<User> {
    const result = await this.db
      .insert(users)
      .values({
        id: user.id,
        learningStyle: user.learningStyle,
        mode: user.mode,
        createdAt: user.createdAt,
        updatedAt: user.updatedAt,
      })
      .onConflictDoUpdate({
        target: users.id,
        set: {
          learningStyle: user.learningStyle,
          mode: user.mode,
          updatedAt: user.updatedAt,
        },
      })
      .returning();

    return mapToDomain(result[0]);
  }

  async findAll(): Promise<User[]> {
    const results = await this.db.select().from(users);
    return results.map(mapToDomain);
  }
}
