import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 5,
  name: 'create_subscriptions',

  up(db: Database): void {
    db.exec(`
      CREATE TABLE subscriptions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        author_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at TEXT NOT NULL,
        UNIQUE (user_id, author_id),
        CHECK (user_id <> author_id)
      );

      CREATE INDEX idx_subscriptions_author ON subscriptions(author_id);
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS subscriptions');
  },
};
