import type { Database } from 'better-sqlite3';
import type { RecipeIngredient, RecipeIngredientInput } from '@foodgram/shared';
import { BaseRepository } from './base.repository.js';
import { parseRows, readNumber, readString } from '../db/row-guards.js';

export interface RecipeRecord {
  id: number;
  author_id: number;
  name: string;
  image: string;
  text: string;
  cooking_time: number;
  pub_date: string;
}

export type RecipeFields = Pick<RecipeRecord, 'name' | 'image' | 'text' | 'cooking_time'>;

export interface RecipeListFilter {
  authorId?: number;
  /** Required for the favorited/in-cart filters; they are ignored without it. */
  viewerId?: number;
  favorited?: boolean;
  inShoppingCart?: boolean;
  limit: number;
  offset: number;
}

export interface RecipePage {
  count: number;
  recipes: RecipeRecord[];
}

function parseRecipeIngredient(row: Record<string, unknown>): (RecipeIngredient & { recipe_id: number }) | null {
  const recipeId = readNumber(row, 'recipe_id');
  const id = readNumber(row, 'id');
  const name = readString(row, 'name');
  const measurementUnit = readString(row, 'measurement_unit');
  const amount = readNumber(row, 'amount');
  if (recipeId === null || id === null || name === null || measurementUnit === null || amount === null) {
    return null;
  }
  return { recipe_id: recipeId, id, name, measurement_unit: measurementUnit, amount };
}

export class RecipeRepository extends BaseRepository<RecipeRecord> {
  constructor(db: Database) {
    super(db, 'recipes');
  }

  protected parseEntity(row: Record<string, unknown>): RecipeRecord | null {
    const id = readNumber(row, 'id');
    const authorId = readNumber(row, 'author_id');
    const name = readString(row, 'name');
    const image = readString(row, 'image');
    const text = readString(row, 'text');
    const cookingTime = readNumber(row, 'cooking_time');
    const pubDate = readString(row, 'pub_date');

    if (
      id === null ||
      authorId === null ||
      name === null ||
      image === null ||
      text === null ||
      cookingTime === null ||
      pubDate === null
    ) {
      return null;
    }

    return {
      id,
      author_id: authorId,
      name,
      image,
      text,
      cooking_time: cookingTime,
      pub_date: pubDate,
    };
  }

  /** Insert the recipe and its ingredient rows in one transaction. */
  create(authorId: number, fields: RecipeFields, ingredients: RecipeIngredientInput[]): RecipeRecord {
    return this.db.transaction((): RecipeRecord => {
      const pubDate = this.timestamp();
      const result = this.db
        .prepare(
          `INSERT INTO recipes (author_id, name, image, text, cooking_time, pub_date)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(authorId, fields.name, fields.image, fields.text, fields.cooking_time, pubDate);
      const id = Number(result.lastInsertRowid);
      this.insertIngredients(id, ingredients);
      return { id, author_id: authorId, ...fields, pub_date: pubDate };
    })();
  }

  /**
   * Apply field changes and replace the ingredient rows wholesale, atomically.
   * Readers never observe the recipe without ingredients.
   */
  update(id: number, fields: Partial<RecipeFields>, ingredients: RecipeIngredientInput[]): RecipeRecord | null {
    return this.db.transaction((): RecipeRecord | null => {
      const existing = this.findById(id);
      if (existing === null) {
        return null;
      }

      const updated: RecipeRecord = {
        ...existing,
        name: fields.name ?? existing.name,
        image: fields.image ?? existing.image,
        text: fields.text ?? existing.text,
        cooking_time: fields.cooking_time ?? existing.cooking_time,
      };

      this.db
        .prepare('UPDATE recipes SET name = ?, image = ?, text = ?, cooking_time = ? WHERE id = ?')
        .run(updated.name, updated.image, updated.text, updated.cooking_time, id);
      this.db.prepare('DELETE FROM recipe_ingredients WHERE recipe_id = ?').run(id);
      this.insertIngredients(id, ingredients);

      return updated;
    })();
  }

  private insertIngredients(recipeId: number, ingredients: RecipeIngredientInput[]): void {
    const insert = this.db.prepare(
      'INSERT INTO recipe_ingredients (recipe_id, ingredient_id, amount, position) VALUES (?, ?, ?, ?)'
    );
    ingredients.forEach((ingredient, position) => {
      insert.run(recipeId, ingredient.id, ingredient.amount, position);
    });
  }

  list(filter: RecipeListFilter): RecipePage {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.authorId !== undefined) {
      conditions.push('r.author_id = ?');
      params.push(filter.authorId);
    }

    if (filter.viewerId !== undefined) {
      const relationFilters: Array<['favorite' | 'shopping_cart', boolean | undefined]> = [
        ['favorite', filter.favorited],
        ['shopping_cart', filter.inShoppingCart],
      ];
      for (const [kind, wanted] of relationFilters) {
        if (wanted === undefined) {
          continue;
        }
        conditions.push(
          `${wanted ? '' : 'NOT '}EXISTS (
            SELECT 1 FROM recipe_relations rr
            WHERE rr.recipe_id = r.id AND rr.user_id = ? AND rr.kind = ?
          )`
        );
        params.push(filter.viewerId, kind);
      }
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const countValue = this.db
      .prepare(`SELECT COUNT(*) FROM recipes r ${where}`)
      .pluck()
      .get(...params);

    const recipes = this.queryMany(
      `SELECT r.* FROM recipes r ${where} ORDER BY r.pub_date DESC, r.id DESC LIMIT ? OFFSET ?`,
      ...params,
      filter.limit,
      filter.offset
    );

    return {
      count: typeof countValue === 'number' ? countValue : 0,
      recipes,
    };
  }

  /** Newest first; all of them when `limit` is undefined. */
  findByAuthor(authorId: number, limit?: number): RecipeRecord[] {
    return this.queryMany(
      'SELECT * FROM recipes WHERE author_id = ? ORDER BY pub_date DESC, id DESC LIMIT ?',
      authorId,
      limit ?? -1
    );
  }

  countByAuthor(authorId: number): number {
    const value = this.db
      .prepare('SELECT COUNT(*) FROM recipes WHERE author_id = ?')
      .pluck()
      .get(authorId);
    return typeof value === 'number' ? value : 0;
  }

  /** Ingredient rows of each recipe, in the order they were submitted. */
  findIngredients(recipeIds: number[]): Map<number, RecipeIngredient[]> {
    const byRecipe = new Map<number, RecipeIngredient[]>();
    if (recipeIds.length === 0) {
      return byRecipe;
    }

    const placeholders = recipeIds.map(() => '?').join(', ');
    const rows = this.db
      .prepare(
        `SELECT ri.recipe_id, i.id, i.name, i.measurement_unit, ri.amount
         FROM recipe_ingredients ri
         JOIN ingredients i ON i.id = ri.ingredient_id
         WHERE ri.recipe_id IN (${placeholders})
         ORDER BY ri.recipe_id, ri.position`
      )
      .all(...recipeIds);

    for (const { recipe_id: recipeId, ...ingredient } of parseRows(rows, parseRecipeIngredient)) {
      const list = byRecipe.get(recipeId) ?? [];
      list.push(ingredient);
      byRecipe.set(recipeId, list);
    }
    return byRecipe;
  }

  exists(id: number): boolean {
    return this.db.prepare('SELECT 1 FROM recipes WHERE id = ?').get(id) !== undefined;
  }
}
