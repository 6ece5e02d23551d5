import type { Database } from 'better-sqlite3';
import { isUniqueConstraintError, parseRows, readNumber } from '../db/row-guards.js';

export class SubscriptionRepository {
  constructor(private readonly db: Database) {}

  /** Returns false when `userId` already follows `authorId`. */
  add(userId: number, authorId: number): boolean {
    try {
      this.db
        .prepare('INSERT INTO subscriptions (user_id, author_id, created_at) VALUES (?, ?, ?)')
        .run(userId, authorId, new Date().toISOString());
      return true;
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        return false;
      }
      throw error;
    }
  }

  remove(userId: number, authorId: number): boolean {
    const result = this.db
      .prepare('DELETE FROM subscriptions WHERE user_id = ? AND author_id = ?')
      .run(userId, authorId);
    return result.changes > 0;
  }

  /** The subset of `authorIds` that `userId` follows. */
  findFollowedAmong(userId: number, authorIds: number[]): Set<number> {
    if (authorIds.length === 0) {
      return new Set();
    }
    const placeholders = authorIds.map(() => '?').join(', ');
    const rows = this.db
      .prepare(
        `SELECT author_id FROM subscriptions WHERE user_id = ? AND author_id IN (${placeholders})`
      )
      .all(userId, ...authorIds);
    return new Set(parseRows(rows, (row) => readNumber(row, 'author_id')));
  }

  /** Ids of the authors `userId` follows, ordered by username. */
  findAuthorIds(userId: number, limit: number, offset: number): number[] {
    const rows = this.db
      .prepare(
        `SELECT s.author_id FROM subscriptions s
         JOIN users u ON u.id = s.author_id
         WHERE s.user_id = ?
         ORDER BY u.username
         LIMIT ? OFFSET ?`
      )
      .all(userId, limit, offset);
    return parseRows(rows, (row) => readNumber(row, 'author_id'));
  }

  countAuthors(userId: number): number {
    const value = this.db
      .prepare('SELECT COUNT(*) FROM subscriptions WHERE user_id = ?')
      .pluck()
      .get(userId);
    return typeof value === 'number' ? value : 0;
  }
}
