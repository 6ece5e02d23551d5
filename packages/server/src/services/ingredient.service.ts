import type { CreateIngredientDTO, Ingredient } from '@foodgram/shared';
import type { Repositories } from '../repositories/index.js';
import { isUniqueConstraintError } from '../db/row-guards.js';
import { ConflictError, NotFoundError } from '../types/errors.js';

export class IngredientService {
  constructor(private readonly repos: Repositories) {}

  list(namePrefix?: string): Ingredient[] {
    return this.repos.ingredients.findAll(namePrefix);
  }

  get(id: number): Ingredient {
    const ingredient = this.repos.ingredients.findById(id);
    if (ingredient === null) {
      throw new NotFoundError('Ingredient', id);
    }
    return ingredient;
  }

  create(data: CreateIngredientDTO): Ingredient {
    try {
      return this.repos.ingredients.create(data);
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw new ConflictError(
          `Ingredient "${data.name}" measured in "${data.measurement_unit}" already exists`
        );
      }
      throw error;
    }
  }

  /** Bulk load, skipping pairs that already exist. Returns rows added. */
  import(items: CreateIngredientDTO[]): number {
    return this.repos.ingredients.createMany(items);
  }
}
