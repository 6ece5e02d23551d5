import { Router, type Request, type Response } from 'express';
import {
  createRecipeSchema,
  recipeListQuerySchema,
  updateRecipeSchema,
  type ApiResponse,
  type Paginated,
  type Recipe,
  type RecipeRelationKind,
  type RecipeSummary,
  type ShortLinkResponse,
} from '@foodgram/shared';
import type { AppConfig } from '../config.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { requireUser, viewerId } from '../middleware/auth.js';
import { getServices } from '../services/index.js';
import { readId } from './params.js';

/** POST adds the recipe to the caller's collection, DELETE removes it. */
function mountCollection(router: Router, path: string, kind: RecipeRelationKind): void {
  router.post(`/:id/${path}`, asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const response: ApiResponse<RecipeSummary> = {
      success: true,
      data: getServices().recipes.addToCollection(kind, user, readId(req, 'Recipe')),
    };
    res.status(201).json(response);
  }));

  router.delete(`/:id/${path}`, asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    getServices().recipes.removeFromCollection(kind, user, readId(req, 'Recipe'));
    res.status(204).end();
  }));
}

export function createRecipesRouter(config: AppConfig): Router {
  const router = Router();

  // GET /api/recipes
  router.get('/', asyncHandler((req: Request, res: Response) => {
    const query = recipeListQuerySchema.parse(req.query);
    const response: ApiResponse<Paginated<Recipe>> = {
      success: true,
      data: getServices().recipes.list(query, viewerId(req), config.pageSize),
    };
    res.json(response);
  }));

  // POST /api/recipes
  router.post('/', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const input = createRecipeSchema.parse(req.body);
    const response: ApiResponse<Recipe> = {
      success: true,
      data: getServices().recipes.create(user, input),
    };
    res.status(201).json(response);
  }));

  // GET /api/recipes/download_shopping_cart
  router.get('/download_shopping_cart', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const file = getServices().shoppingList.export(user);
    res
      .status(200)
      .attachment(file.filename)
      .type('text/plain; charset=utf-8')
      .send(file.content);
  }));

  // GET /api/recipes/:id
  router.get('/:id', asyncHandler((req: Request, res: Response) => {
    const response: ApiResponse<Recipe> = {
      success: true,
      data: getServices().recipes.get(readId(req, 'Recipe'), viewerId(req)),
    };
    res.json(response);
  }));

  // PATCH /api/recipes/:id
  router.patch('/:id', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const id = readId(req, 'Recipe');
    const input = updateRecipeSchema.parse(req.body);
    const response: ApiResponse<Recipe> = {
      success: true,
      data: getServices().recipes.update(id, user, input),
    };
    res.json(response);
  }));

  // DELETE /api/recipes/:id
  router.delete('/:id', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    getServices().recipes.delete(readId(req, 'Recipe'), user);
    res.status(204).end();
  }));

  // GET /api/recipes/:id/get-link
  router.get('/:id/get-link', asyncHandler((req: Request, res: Response) => {
    const response: ApiResponse<ShortLinkResponse> = {
      success: true,
      data: { 'short-link': getServices().recipes.shortLink(readId(req, 'Recipe'), config.publicUrl) },
    };
    res.json(response);
  }));

  mountCollection(router, 'favorite', 'favorite');
  mountCollection(router, 'shopping_cart', 'shopping_cart');

  return router;
}
