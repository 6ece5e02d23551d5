import type { Database } from 'better-sqlite3';
import type { CreateIngredientDTO, Ingredient } from '@foodgram/shared';
import { BaseRepository } from './base.repository.js';
import { readNumber, readString } from '../db/row-guards.js';

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class IngredientRepository extends BaseRepository<Ingredient> {
  constructor(db: Database) {
    super(db, 'ingredients');
  }

  protected parseEntity(row: Record<string, unknown>): Ingredient | null {
    const id = readNumber(row, 'id');
    const name = readString(row, 'name');
    const measurementUnit = readString(row, 'measurement_unit');
    if (id === null || name === null || measurementUnit === null) {
      return null;
    }
    return { id, name, measurement_unit: measurementUnit };
  }

  create(data: CreateIngredientDTO): Ingredient {
    const result = this.db
      .prepare('INSERT INTO ingredients (name, measurement_unit) VALUES (?, ?)')
      .run(data.name, data.measurement_unit);
    return {
      id: Number(result.lastInsertRowid),
      name: data.name,
      measurement_unit: data.measurement_unit,
    };
  }

  /**
   * Insert many ingredients, skipping (name, unit) pairs that already exist.
   * Returns the number of rows actually inserted.
   */
  createMany(items: CreateIngredientDTO[]): number {
    const insert = this.db.prepare(
      'INSERT OR IGNORE INTO ingredients (name, measurement_unit) VALUES (?, ?)'
    );
    return this.db.transaction((rows: CreateIngredientDTO[]) => {
      let inserted = 0;
      for (const row of rows) {
        inserted += insert.run(row.name, row.measurement_unit).changes;
      }
      return inserted;
    })(items);
  }

  /**
   * All ingredients ordered by name, ignoring case. With `namePrefix`, only names starting
   * with it (case-insensitive for ASCII letters, as SQLite LIKE is).
   */
  findAll(namePrefix?: string): Ingredient[] {
    if (namePrefix === undefined || namePrefix === '') {
      return this.queryMany('SELECT * FROM ingredients ORDER BY name COLLATE NOCASE, name, measurement_unit');
    }
    return this.queryMany(
      "SELECT * FROM ingredients WHERE name LIKE ? ESCAPE '\\' ORDER BY name COLLATE NOCASE, name, measurement_unit",
      `${escapeLike(namePrefix)}%`
    );
  }

  findByIds(ids: number[]): Ingredient[] {
    if (ids.length === 0) {
      return [];
    }
    const placeholders = ids.map(() => '?').join(', ');
    return this.queryMany(`SELECT * FROM ingredients WHERE id IN (${placeholders})`, ...ids);
  }
}
