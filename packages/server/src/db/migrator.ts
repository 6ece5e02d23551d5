import type { Database } from 'better-sqlite3';
import { info } from 'firebase-functions/logger';
import { parseRows, readNumber } from './row-guards.js';

export interface Migration {
  version: number;
  name: string;
  up(db: Database): void;
  down(db: Database): void;
}

/**
 * Applies numbered migrations in order and records each applied
 * version in `schema_migrations`. Every migration runs in its own
 * transaction.
 */
export class Migrator {
  private readonly migrations: Migration[];

  constructor(
    private readonly db: Database,
    migrations: Migration[]
  ) {
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      )
    `);
  }

  appliedVersions(): number[] {
    const rows = this.db
      .prepare('SELECT version FROM schema_migrations ORDER BY version')
      .all();
    return parseRows(rows, (row) => readNumber(row, 'version'));
  }

  /** Apply every pending migration. Returns the versions applied. */
  up(): number[] {
    const applied = new Set(this.appliedVersions());
    const ran: number[] = [];

    for (const migration of this.migrations) {
      if (applied.has(migration.version)) {
        continue;
      }
      this.db.transaction(() => {
        migration.up(this.db);
        this.db
          .prepare('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)')
          .run(migration.version, migration.name, new Date().toISOString());
      })();
      info('Applied migration', { version: migration.version, name: migration.name });
      ran.push(migration.version);
    }

    return ran;
  }

  /** Roll back the most recently applied migration, if any. */
  down(): number | null {
    const latest = this.appliedVersions().at(-1);
    if (latest === undefined) {
      return null;
    }
    const migration = this.migrations.find((m) => m.version === latest);
    if (!migration) {
      throw new Error(`Migration ${latest} is applied but not known`);
    }

    this.db.transaction(() => {
      migration.down(this.db);
      this.db.prepare('DELETE FROM schema_migrations WHERE version = ?').run(latest);
    })();
    info('Rolled back migration', { version: migration.version, name: migration.name });
    return latest;
  }
}
