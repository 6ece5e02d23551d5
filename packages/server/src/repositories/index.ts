import type { Database } from 'better-sqlite3';
import { getDatabase } from '../db/index.js';
import { UserRepository } from './user.repository.js';
import { IngredientRepository } from './ingredient.repository.js';
import { RecipeRepository } from './recipe.repository.js';
import { RecipeRelationRepository } from './recipe-relation.repository.js';
import { SubscriptionRepository } from './subscription.repository.js';
import { AuthTokenRepository } from './auth-token.repository.js';

export { UserRepository } from './user.repository.js';
export { IngredientRepository } from './ingredient.repository.js';
export { RecipeRepository } from './recipe.repository.js';
export { RecipeRelationRepository } from './recipe-relation.repository.js';
export { SubscriptionRepository } from './subscription.repository.js';
export { AuthTokenRepository } from './auth-token.repository.js';
export type { UserRecord, NewUser } from './user.repository.js';
export type { RecipeRecord, RecipeFields, RecipeListFilter, RecipePage } from './recipe.repository.js';

export interface Repositories {
  users: UserRepository;
  ingredients: IngredientRepository;
  recipes: RecipeRepository;
  favorites: RecipeRelationRepository;
  shoppingCart: RecipeRelationRepository;
  subscriptions: SubscriptionRepository;
  authTokens: AuthTokenRepository;
}

export function createRepositories(db: Database): Repositories {
  return {
    users: new UserRepository(db),
    ingredients: new IngredientRepository(db),
    recipes: new RecipeRepository(db),
    favorites: new RecipeRelationRepository(db, 'favorite'),
    shoppingCart: new RecipeRelationRepository(db, 'shopping_cart'),
    subscriptions: new SubscriptionRepository(db),
    authTokens: new AuthTokenRepository(db),
  };
}

let repositories: Repositories | null = null;

export function getRepositories(): Repositories {
  if (repositories === null) {
    repositories = createRepositories(getDatabase());
  }
  return repositories;
}

// Reset repository singletons (for testing)
export function resetRepositories(): void {
  repositories = null;
}
