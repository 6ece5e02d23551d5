import type { Ingredient, RecipeIngredientInput } from '@foodgram/shared';
import type { RecipeRecord, Repositories, UserRecord } from '../repositories/index.js';
import { generateTokenKey, hashPassword } from '../services/password.js';

export const TEST_PASSWORD = 'test-password';
export const TEST_IMAGE = 'data:image/png;base64,iVBORw0KGgo=';

// Hashing is slow; every fixture user shares one hash
const TEST_PASSWORD_HASH = hashPassword(TEST_PASSWORD);

let userCounter = 0;

export function createUser(repos: Repositories, overrides: Partial<UserRecord> = {}): UserRecord {
  userCounter += 1;
  return repos.users.create({
    email: overrides.email ?? `cook${userCounter}@example.com`,
    username: overrides.username ?? `cook${userCounter}`,
    first_name: overrides.first_name ?? 'Test',
    last_name: overrides.last_name ?? 'Cook',
    password_hash: overrides.password_hash ?? TEST_PASSWORD_HASH,
  });
}

/** A user plus the `Authorization` header value for them. */
export function createAuthedUser(
  repos: Repositories,
  overrides: Partial<UserRecord> = {}
): { user: UserRecord; authorization: string } {
  const user = createUser(repos, overrides);
  const key = repos.authTokens.findOrCreate(user.id, generateTokenKey);
  return { user, authorization: `Token ${key}` };
}

export function createIngredient(repos: Repositories, name: string, unit = 'g'): Ingredient {
  return repos.ingredients.create({ name, measurement_unit: unit });
}

export function createRecipe(
  repos: Repositories,
  author: UserRecord,
  ingredients: RecipeIngredientInput[],
  overrides: Partial<Pick<RecipeRecord, 'name' | 'text' | 'cooking_time'>> = {}
): RecipeRecord {
  return repos.recipes.create(
    author.id,
    {
      name: overrides.name ?? 'Test recipe',
      image: TEST_IMAGE,
      text: overrides.text ?? 'Cook it.',
      cooking_time: overrides.cooking_time ?? 20,
    },
    ingredients
  );
}
