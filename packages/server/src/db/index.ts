import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { info } from 'firebase-functions/logger';
import { Migrator } from './migrator.js';
import { migrations } from './migrations/index.js';

export type { Migration } from './migrator.js';
export { Migrator } from './migrator.js';

let db: Database.Database | null = null;
let testDb: Database.Database | null = null;

/**
 * Open a database at `filename` (or `:memory:`), enable foreign keys
 * and bring the schema up to date.
 */
export function createDatabase(filename: string): Database.Database {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const database = new Database(filename);
  database.pragma('foreign_keys = ON');
  if (filename !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }

  new Migrator(database, migrations).up();
  return database;
}

export function initializeDatabase(filename: string): Database.Database {
  if (db === null) {
    db = createDatabase(filename);
    info('Database ready', { filename });
  }
  return db;
}

export function getDatabase(): Database.Database {
  if (testDb !== null) {
    return testDb;
  }
  if (db === null) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return db;
}

export function setTestDatabase(database: Database.Database | null): void {
  testDb = database;
}

export function closeDatabase(): void {
  if (db !== null) {
    db.close();
    db = null;
  }
}
