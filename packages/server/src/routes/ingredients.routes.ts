import { Router, type Request, type Response } from 'express';
import {
  createIngredientSchema,
  ingredientQuerySchema,
  type ApiResponse,
  type Ingredient,
} from '@foodgram/shared';
import { asyncHandler } from '../middleware/async-handler.js';
import { requireUser } from '../middleware/auth.js';
import { getServices } from '../services/index.js';
import { readId } from './params.js';

export function createIngredientsRouter(): Router {
  const router = Router();

  // GET /api/ingredients?name=<prefix>
  router.get('/', asyncHandler((req: Request, res: Response) => {
    const { name } = ingredientQuerySchema.parse(req.query);
    const response: ApiResponse<Ingredient[]> = {
      success: true,
      data: getServices().ingredients.list(name),
    };
    res.json(response);
  }));

  // GET /api/ingredients/:id
  router.get('/:id', asyncHandler((req: Request, res: Response) => {
    const response: ApiResponse<Ingredient> = {
      success: true,
      data: getServices().ingredients.get(readId(req, 'Ingredient')),
    };
    res.json(response);
  }));

  // POST /api/ingredients
  router.post('/', asyncHandler((req: Request, res: Response) => {
    requireUser(req);
    const input = createIngredientSchema.parse(req.body);
    const response: ApiResponse<Ingredient> = {
      success: true,
      data: getServices().ingredients.create(input),
    };
    res.status(201).json(response);
  }));

  return router;
}
