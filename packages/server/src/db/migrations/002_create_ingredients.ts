import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 2,
  name: 'create_ingredients',

  up(db: Database): void {
    db.exec(`
      CREATE TABLE ingredients (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        measurement_unit TEXT NOT NULL,
        UNIQUE (name, measurement_unit)
      );

      CREATE INDEX idx_ingredients_name ON ingredients(name);
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS ingredients');
  },
};
