import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '../middleware/async-handler.js';
import { getServices } from '../services/index.js';
import { NotFoundError } from '../types/errors.js';
import { readId } from './params.js';

export function createShortLinkRouter(): Router {
  const router = Router();

  // GET /s/:id -> /recipes/:id/
  router.get('/s/:id', asyncHandler((req: Request, res: Response) => {
    const id = readId(req, 'Recipe');
    if (!getServices().recipes.exists(id)) {
      throw new NotFoundError('Recipe', id);
    }
    res.redirect(302, `/recipes/${id}/`);
  }));

  return router;
}
