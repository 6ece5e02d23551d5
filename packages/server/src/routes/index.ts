import { Router } from 'express';
import type { AppConfig } from '../config.js';
import { createAuthRouter } from './auth.routes.js';
import { createUsersRouter } from './users.routes.js';
import { createIngredientsRouter } from './ingredients.routes.js';
import { createRecipesRouter } from './recipes.routes.js';

export { createShortLinkRouter } from './short-link.routes.js';

export function createApiRouter(config: AppConfig): Router {
  const apiRouter = Router();

  apiRouter.use('/auth', createAuthRouter());
  apiRouter.use('/users', createUsersRouter(config));
  apiRouter.use('/ingredients', createIngredientsRouter());
  apiRouter.use('/recipes', createRecipesRouter(config));

  return apiRouter;
}
