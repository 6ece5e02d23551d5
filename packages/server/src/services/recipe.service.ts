import type {
  CreateRecipeDTO,
  Paginated,
  Recipe,
  RecipeIngredientInput,
  RecipeListQuery,
  RecipeRelationKind,
  RecipeSummary,
  UpdateRecipeDTO,
} from '@foodgram/shared';
import { info } from 'firebase-functions/logger';
import type {
  RecipeRecord,
  RecipeRelationRepository,
  Repositories,
  UserRecord,
} from '../repositories/index.js';
import { ForbiddenError, NotFoundError, ValidationError } from '../types/errors.js';
import { validateRecipeIngredients } from './recipe-validation.js';
import { toRecipeSummary, type UserService } from './user.service.js';

const COLLECTION_LABELS: Record<RecipeRelationKind, string> = {
  favorite: 'favorites',
  shopping_cart: 'the shopping cart',
};

export class RecipeService {
  constructor(
    private readonly repos: Repositories,
    private readonly users: UserService
  ) {}

  private collection(kind: RecipeRelationKind): RecipeRelationRepository {
    return kind === 'favorite' ? this.repos.favorites : this.repos.shoppingCart;
  }

  private checkIngredients(ingredients: RecipeIngredientInput[]): void {
    const known = this.repos.ingredients.findByIds(ingredients.map((ingredient) => ingredient.id));
    validateRecipeIngredients(ingredients, new Set(known.map((ingredient) => ingredient.id)));
  }

  /** Full representations of `records`, as seen by `viewerId`. */
  private present(records: RecipeRecord[], viewerId: number | null): Recipe[] {
    const recipeIds = records.map((recipe) => recipe.id);
    const authorIds = [...new Set(records.map((recipe) => recipe.author_id))];
    const authors = new Map(
      this.users
        .toProfiles(this.repos.users.findByIds(authorIds), viewerId)
        .map((profile) => [profile.id, profile])
    );
    const ingredients = this.repos.recipes.findIngredients(recipeIds);
    const favorited = viewerId === null ? new Set<number>() : this.repos.favorites.findRecipeIds(viewerId, recipeIds);
    const inCart = viewerId === null ? new Set<number>() : this.repos.shoppingCart.findRecipeIds(viewerId, recipeIds);

    return records.map((recipe) => {
      const author = authors.get(recipe.author_id);
      if (author === undefined) {
        throw new Error(`Author ${recipe.author_id} of recipe ${recipe.id} not found`);
      }
      return {
        id: recipe.id,
        author,
        ingredients: ingredients.get(recipe.id) ?? [],
        is_favorited: favorited.has(recipe.id),
        is_in_shopping_cart: inCart.has(recipe.id),
        name: recipe.name,
        image: recipe.image,
        text: recipe.text,
        cooking_time: recipe.cooking_time,
      };
    });
  }

  private presentOne(record: RecipeRecord, viewerId: number | null): Recipe {
    const [recipe] = this.present([record], viewerId);
    if (recipe === undefined) {
      throw new Error(`Failed to present recipe ${record.id}`);
    }
    return recipe;
  }

  private requireRecipe(id: number): RecipeRecord {
    const recipe = this.repos.recipes.findById(id);
    if (recipe === null) {
      throw new NotFoundError('Recipe', id);
    }
    return recipe;
  }

  private requireAuthor(recipe: RecipeRecord, user: UserRecord): void {
    if (recipe.author_id !== user.id) {
      throw new ForbiddenError('Only the author can change this recipe');
    }
  }

  /**
   * Newest first. The favorited / in-cart filters only apply to an
   * authenticated viewer.
   */
  list(query: RecipeListQuery, viewerId: number | null, defaultLimit: number): Paginated<Recipe> {
    const page = this.repos.recipes.list({
      authorId: query.author,
      viewerId: viewerId ?? undefined,
      favorited: query.is_favorited,
      inShoppingCart: query.is_in_shopping_cart,
      limit: query.limit ?? defaultLimit,
      offset: query.offset,
    });
    return {
      count: page.count,
      results: this.present(page.recipes, viewerId),
    };
  }

  get(id: number, viewerId: number | null): Recipe {
    return this.presentOne(this.requireRecipe(id), viewerId);
  }

  create(author: UserRecord, input: CreateRecipeDTO): Recipe {
    this.checkIngredients(input.ingredients);
    const { ingredients, ...fields } = input;
    const recipe = this.repos.recipes.create(author.id, fields, ingredients);
    info('Recipe created', { recipeId: recipe.id, authorId: author.id });
    return this.presentOne(recipe, author.id);
  }

  update(id: number, user: UserRecord, input: UpdateRecipeDTO): Recipe {
    this.requireAuthor(this.requireRecipe(id), user);
    this.checkIngredients(input.ingredients);

    const { ingredients, ...fields } = input;
    const updated = this.repos.recipes.update(id, fields, ingredients);
    if (updated === null) {
      throw new NotFoundError('Recipe', id);
    }
    return this.presentOne(updated, user.id);
  }

  delete(id: number, user: UserRecord): void {
    this.requireAuthor(this.requireRecipe(id), user);
    this.repos.recipes.delete(id);
    info('Recipe deleted', { recipeId: id, authorId: user.id });
  }

  /** Fails when the recipe is already in the collection. */
  addToCollection(kind: RecipeRelationKind, user: UserRecord, recipeId: number): RecipeSummary {
    const recipe = this.requireRecipe(recipeId);
    if (!this.collection(kind).add(user.id, recipe.id)) {
      throw ValidationError.forField(
        'recipe',
        `Recipe "${recipe.name}" is already in ${COLLECTION_LABELS[kind]}`
      );
    }
    return toRecipeSummary(recipe);
  }

  /** Fails with not-found when the recipe is not in the collection. */
  removeFromCollection(kind: RecipeRelationKind, user: UserRecord, recipeId: number): void {
    this.requireRecipe(recipeId);
    if (!this.collection(kind).remove(user.id, recipeId)) {
      throw new NotFoundError(kind === 'favorite' ? 'Favorite recipe' : 'Shopping cart recipe', recipeId);
    }
  }

  shortLink(id: number, publicUrl: string): string {
    if (!this.repos.recipes.exists(id)) {
      throw new NotFoundError('Recipe', id);
    }
    return `${publicUrl.replace(/\/+$/, '')}/s/${id}/`;
  }

  exists(id: number): boolean {
    return this.repos.recipes.exists(id);
  }
}
