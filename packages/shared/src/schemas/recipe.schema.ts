import { z } from 'zod';
import { MAX_AMOUNT, MAX_COOKING_TIME, MIN_AMOUNT, MIN_COOKING_TIME } from '../constants.js';
import { imageDataUrlSchema } from './user.schema.js';

export const recipeIngredientSchema = z.object({
  id: z.number().int().positive(),
  amount: z.number().int().min(MIN_AMOUNT).max(MAX_AMOUNT),
});

// Emptiness and duplicates are checked by the recipe service so the
// error can name the offending ids.
export const createRecipeSchema = z.object({
  ingredients: z.array(recipeIngredientSchema),
  name: z.string().trim().min(1).max(256),
  image: imageDataUrlSchema,
  text: z.string().trim().min(1),
  cooking_time: z.number().int().min(MIN_COOKING_TIME).max(MAX_COOKING_TIME),
});

export const updateRecipeSchema = createRecipeSchema.partial().extend({
  ingredients: z.array(recipeIngredientSchema),
});

export type RecipeIngredientInput = z.infer<typeof recipeIngredientSchema>;
export type CreateRecipeInput = z.infer<typeof createRecipeSchema>;
export type UpdateRecipeInput = z.infer<typeof updateRecipeSchema>;

export type CreateRecipeDTO = CreateRecipeInput;
export type UpdateRecipeDTO = UpdateRecipeInput;
