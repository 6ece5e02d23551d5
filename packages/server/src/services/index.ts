import type { Database } from 'better-sqlite3';
import { getDatabase } from '../db/index.js';
import { createRepositories, getRepositories, type Repositories } from '../repositories/index.js';
import { AuthService } from './auth.service.js';
import { UserService } from './user.service.js';
import { SubscriptionService } from './subscription.service.js';
import { IngredientService } from './ingredient.service.js';
import { RecipeService } from './recipe.service.js';
import { ShoppingListService } from './shopping-list.service.js';

export { AuthService } from './auth.service.js';
export { UserService } from './user.service.js';
export { SubscriptionService } from './subscription.service.js';
export { IngredientService } from './ingredient.service.js';
export { RecipeService } from './recipe.service.js';
export { ShoppingListService } from './shopping-list.service.js';
export type { ShoppingListFile } from './shopping-list.service.js';

export interface Services {
  auth: AuthService;
  users: UserService;
  subscriptions: SubscriptionService;
  ingredients: IngredientService;
  recipes: RecipeService;
  shoppingList: ShoppingListService;
}

function buildServices(db: Database, repos: Repositories): Services {
  const users = new UserService(repos);
  return {
    auth: new AuthService(repos),
    users,
    subscriptions: new SubscriptionService(repos, users),
    ingredients: new IngredientService(repos),
    recipes: new RecipeService(repos, users),
    shoppingList: new ShoppingListService(db, repos),
  };
}

// Helper to create services with a custom database (useful for testing)
export function createServices(db: Database): Services {
  return buildServices(db, createRepositories(db));
}

let services: Services | null = null;

export function getServices(): Services {
  if (services === null) {
    services = buildServices(getDatabase(), getRepositories());
  }
  return services;
}

// Reset all service singletons (for testing)
export function resetServices(): void {
  services = null;
}
