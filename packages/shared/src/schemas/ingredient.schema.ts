import { z } from 'zod';

export const createIngredientSchema = z.object({
  name: z.string().trim().min(1).max(128),
  measurement_unit: z.string().trim().min(1).max(64),
});

export const ingredientQuerySchema = z.object({
  name: z.string().optional(),
});

export type CreateIngredientInput = z.infer<typeof createIngredientSchema>;
export type IngredientQuery = z.infer<typeof ingredientQuerySchema>;

export type CreateIngredientDTO = CreateIngredientInput;
