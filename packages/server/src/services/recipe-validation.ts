import type { RecipeIngredientInput } from '@foodgram/shared';
import { ValidationError } from '../types/errors.js';

/** Ids that occur more than once, ascending, each listed once. */
export function findDuplicateIds(ids: number[]): number[] {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }
  return [...duplicates].sort((a, b) => a - b);
}

/**
 * Reject an empty ingredient list, repeated ingredient ids, and ids
 * that are not in `knownIds`. Runs before anything is written.
 */
export function validateRecipeIngredients(
  ingredients: RecipeIngredientInput[],
  knownIds: ReadonlySet<number>
): void {
  if (ingredients.length === 0) {
    throw ValidationError.forField('ingredients', 'At least one ingredient is required.');
  }

  const ids = ingredients.map((ingredient) => ingredient.id);

  const duplicates = findDuplicateIds(ids);
  if (duplicates.length > 0) {
    throw ValidationError.forField(
      'ingredients',
      `Ingredients must not repeat. Duplicates: ${duplicates.join(', ')}`
    );
  }

  const unknown = ids.filter((id) => !knownIds.has(id)).sort((a, b) => a - b);
  if (unknown.length > 0) {
    throw ValidationError.forField('ingredients', `Unknown ingredient ids: ${unknown.join(', ')}`);
  }
}
