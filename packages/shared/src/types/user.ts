import type { RecipeSummary } from './recipe.js';

export interface UserProfile {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  avatar: string | null;
  is_subscribed: boolean;
}

/**
 * Profile of an author as seen from the subscriptions list,
 * with a (possibly truncated) list of their recipes.
 */
export interface UserWithRecipes extends UserProfile {
  recipes: RecipeSummary[];
  recipes_count: number;
}

export interface AuthTokenResponse {
  auth_token: string;
}

export interface AvatarResponse {
  avatar: string | null;
}
