import type { UserProfile } from './user.js';

export interface RecipeIngredient {
  id: number;
  name: string;
  measurement_unit: string;
  amount: number;
}

export interface Recipe {
  id: number;
  author: UserProfile;
  ingredients: RecipeIngredient[];
  is_favorited: boolean;
  is_in_shopping_cart: boolean;
  name: string;
  image: string;
  text: string;
  cooking_time: number;
}

export interface RecipeSummary {
  id: number;
  name: string;
  image: string;
  cooking_time: number;
}

/** Per-user recipe collections share one table, told apart by this tag. */
export type RecipeRelationKind = 'favorite' | 'shopping_cart';

export interface ShortLinkResponse {
  'short-link': string;
}
