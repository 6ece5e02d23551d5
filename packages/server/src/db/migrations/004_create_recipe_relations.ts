import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 4,
  name: 'create_recipe_relations',

  up(db: Database): void {
    // Favorites and shopping cart entries, told apart by kind
    db.exec(`
      CREATE TABLE recipe_relations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
        kind TEXT NOT NULL CHECK (kind IN ('favorite', 'shopping_cart')),
        created_at TEXT NOT NULL,
        UNIQUE (user_id, recipe_id, kind)
      );

      CREATE INDEX idx_recipe_relations_recipe ON recipe_relations(recipe_id);
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS recipe_relations');
  },
};
