import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { Migrator } from '../migrator.js';
import { migrations } from '../migrations/index.js';

function tableNames(db: Database.Database): string[] {
  return db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .pluck()
    .all()
    .filter((name): name is string => typeof name === 'string');
}

describe('Migrator', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    db.pragma('foreign_keys = ON');
  });

  afterEach(() => {
    db.close();
  });

  it('should apply all migrations in order', () => {
    const migrator = new Migrator(db, migrations);

    expect(migrator.up()).toEqual([1, 2, 3, 4, 5]);
    expect(tableNames(db)).toEqual([
      'auth_tokens',
      'ingredients',
      'recipe_ingredients',
      'recipe_relations',
      'recipes',
      'schema_migrations',
      'subscriptions',
      'users',
    ]);
  });

  it('should not re-apply migrations that already ran', () => {
    new Migrator(db, migrations).up();

    const second = new Migrator(db, migrations);

    expect(second.up()).toEqual([]);
    expect(second.appliedVersions()).toEqual([1, 2, 3, 4, 5]);
  });

  it('should roll back the latest migration', () => {
    const migrator = new Migrator(db, migrations);
    migrator.up();

    expect(migrator.down()).toBe(5);
    expect(tableNames(db)).not.toContain('subscriptions');
    expect(migrator.appliedVersions()).toEqual([1, 2, 3, 4]);
  });

  it('should return null when nothing is applied', () => {
    const migrator = new Migrator(db, migrations);

    expect(migrator.down()).toBeNull();
  });
});
