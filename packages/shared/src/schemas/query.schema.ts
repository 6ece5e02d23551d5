import { z } from 'zod';
import { MAX_PAGE_SIZE } from '../constants.js';

const TRUTHY_FLAGS = ['1', 'true', 'True'];

/** `1`, `true` and `True` read as true; any other value reads as false. */
export const queryFlagSchema = z.string().transform((value) => TRUTHY_FLAGS.includes(value));

export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
  offset: z.coerce.number().int().min(0).default(0),
});

export const recipeListQuerySchema = paginationQuerySchema.extend({
  author: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().optional()
  ),
  is_favorited: queryFlagSchema.optional(),
  is_in_shopping_cart: queryFlagSchema.optional(),
});

export const subscriptionsQuerySchema = paginationQuerySchema.extend({
  recipes_limit: z.coerce.number().int().min(0).optional(),
});

export const idParamSchema = z.coerce.number().int().positive();

export type PaginationQuery = z.infer<typeof paginationQuerySchema>;
export type RecipeListQuery = z.infer<typeof recipeListQuerySchema>;
export type SubscriptionsQuery = z.infer<typeof subscriptionsQuerySchema>;
