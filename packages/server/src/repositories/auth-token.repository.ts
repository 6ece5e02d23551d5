import type { Database } from 'better-sqlite3';

export class AuthTokenRepository {
  constructor(private readonly db: Database) {}

  /** Existing key of the user, or a new one made by `generateKey`. */
  findOrCreate(userId: number, generateKey: () => string): string {
    return this.db.transaction((): string => {
      const existing = this.db
        .prepare('SELECT key FROM auth_tokens WHERE user_id = ?')
        .pluck()
        .get(userId);
      if (typeof existing === 'string') {
        return existing;
      }
      const key = generateKey();
      this.db
        .prepare('INSERT INTO auth_tokens (key, user_id, created_at) VALUES (?, ?, ?)')
        .run(key, userId, new Date().toISOString());
      return key;
    })();
  }

  findUserId(key: string): number | null {
    const value = this.db.prepare('SELECT user_id FROM auth_tokens WHERE key = ?').pluck().get(key);
    return typeof value === 'number' ? value : null;
  }

  deleteForUser(userId: number): boolean {
    const result = this.db.prepare('DELETE FROM auth_tokens WHERE user_id = ?').run(userId);
    return result.changes > 0;
  }
}
