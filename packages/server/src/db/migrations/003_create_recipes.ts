import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 3,
  name: 'create_recipes',

  up(db: Database): void {
    db.exec(`
      CREATE TABLE recipes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        author_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        name TEXT NOT NULL,
        image TEXT NOT NULL,
        text TEXT NOT NULL,
        cooking_time INTEGER NOT NULL CHECK (cooking_time >= 1),
        pub_date TEXT NOT NULL
      );

      CREATE INDEX idx_recipes_author ON recipes(author_id);
      CREATE INDEX idx_recipes_pub_date ON recipes(pub_date DESC);

      CREATE TABLE recipe_ingredients (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
        ingredient_id INTEGER NOT NULL REFERENCES ingredients(id) ON DELETE CASCADE,
        amount INTEGER NOT NULL CHECK (amount >= 1),
        position INTEGER NOT NULL,
        UNIQUE (recipe_id, ingredient_id)
      );

      CREATE INDEX idx_recipe_ingredients_ingredient ON recipe_ingredients(ingredient_id);
    `);
  },

  down(db: Database): void {
    db.exec(`
      DROP TABLE IF EXISTS recipe_ingredients;
      DROP TABLE IF EXISTS recipes;
    `);
  },
};
