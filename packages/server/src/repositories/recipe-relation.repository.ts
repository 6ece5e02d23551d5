import type { Database } from 'better-sqlite3';
import type { RecipeRelationKind, ShoppingListItem } from '@foodgram/shared';
import { isUniqueConstraintError, parseRows, readNumber, readString } from '../db/row-guards.js';

function parseListItem(row: Record<string, unknown>): ShoppingListItem | null {
  const name = readString(row, 'name');
  const measurementUnit = readString(row, 'measurement_unit');
  const amount = readNumber(row, 'amount');
  if (name === null || measurementUnit === null || amount === null) {
    return null;
  }
  return { name, measurement_unit: measurementUnit, amount };
}

/**
 * A per-user set of recipes. Favorites and the shopping cart are two
 * instances of this repository over the same table.
 */
export class RecipeRelationRepository {
  constructor(
    private readonly db: Database,
    readonly kind: RecipeRelationKind
  ) {}

  /** Returns false when the relation already exists. */
  add(userId: number, recipeId: number): boolean {
    try {
      this.db
        .prepare('INSERT INTO recipe_relations (user_id, recipe_id, kind, created_at) VALUES (?, ?, ?, ?)')
        .run(userId, recipeId, this.kind, new Date().toISOString());
      return true;
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        return false;
      }
      throw error;
    }
  }

  /** Returns false when there was nothing to remove. */
  remove(userId: number, recipeId: number): boolean {
    const result = this.db
      .prepare('DELETE FROM recipe_relations WHERE user_id = ? AND recipe_id = ? AND kind = ?')
      .run(userId, recipeId, this.kind);
    return result.changes > 0;
  }

  has(userId: number, recipeId: number): boolean {
    const row = this.db
      .prepare('SELECT 1 FROM recipe_relations WHERE user_id = ? AND recipe_id = ? AND kind = ?')
      .get(userId, recipeId, this.kind);
    return row !== undefined;
  }

  /** The subset of `recipeIds` this user holds in the collection. */
  findRecipeIds(userId: number, recipeIds: number[]): Set<number> {
    if (recipeIds.length === 0) {
      return new Set();
    }
    const placeholders = recipeIds.map(() => '?').join(', ');
    const rows = this.db
      .prepare(
        `SELECT recipe_id FROM recipe_relations
         WHERE user_id = ? AND kind = ? AND recipe_id IN (${placeholders})`
      )
      .all(userId, this.kind, ...recipeIds);
    return new Set(parseRows(rows, (row) => readNumber(row, 'recipe_id')));
  }

  /** Names of the recipes in the collection, in the order they were added. */
  findRecipeNames(userId: number): string[] {
    const rows = this.db
      .prepare(
        `SELECT r.name FROM recipe_relations rr
         JOIN recipes r ON r.id = rr.recipe_id
         WHERE rr.user_id = ? AND rr.kind = ?
         ORDER BY rr.id`
      )
      .all(userId, this.kind);
    return parseRows(rows, (row) => readString(row, 'name'));
  }

  /**
   * Ingredient totals across every recipe in the collection: one row per
   * distinct (name, unit), ordered by name (ignoring case) then unit.
   */
  sumIngredients(userId: number): ShoppingListItem[] {
    const rows = this.db
      .prepare(
        `SELECT i.name AS name, i.measurement_unit AS measurement_unit, SUM(ri.amount) AS amount
         FROM recipe_relations rr
         JOIN recipe_ingredients ri ON ri.recipe_id = rr.recipe_id
         JOIN ingredients i ON i.id = ri.ingredient_id
         WHERE rr.user_id = ? AND rr.kind = ?
         GROUP BY i.name, i.measurement_unit
         ORDER BY i.name COLLATE NOCASE, i.name, i.measurement_unit`
      )
      .all(userId, this.kind);
    return parseRows(rows, parseListItem);
  }
}
