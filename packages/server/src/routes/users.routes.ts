import { Router, type Request, type Response } from 'express';
import {
  avatarSchema,
  createUserSchema,
  paginationQuerySchema,
  setPasswordSchema,
  subscriptionsQuerySchema,
  type ApiResponse,
  type AvatarResponse,
  type Paginated,
  type UserProfile,
  type UserWithRecipes,
} from '@foodgram/shared';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { requireUser, viewerId } from '../middleware/auth.js';
import { getServices } from '../services/index.js';
import { readId } from './params.js';

const subscribeQuerySchema = z.object({
  recipes_limit: z.coerce.number().int().min(0).optional(),
});

export function createUsersRouter(config: AppConfig): Router {
  const router = Router();

  // GET /api/users
  router.get('/', asyncHandler((req: Request, res: Response) => {
    const query = paginationQuerySchema.parse(req.query);
    const page = getServices().users.list(viewerId(req), query.limit ?? config.pageSize, query.offset);

    const response: ApiResponse<Paginated<UserProfile>> = { success: true, data: page };
    res.json(response);
  }));

  // POST /api/users
  router.post('/', asyncHandler((req: Request, res: Response) => {
    const input = createUserSchema.parse(req.body);
    const { users, auth } = getServices();
    const user = auth.register(input);

    const response: ApiResponse<UserProfile> = {
      success: true,
      data: users.toProfile(user, null),
    };
    res.status(201).json(response);
  }));

  // GET /api/users/me
  router.get('/me', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const response: ApiResponse<UserProfile> = {
      success: true,
      data: getServices().users.toProfile(user, user.id),
    };
    res.json(response);
  }));

  // PUT /api/users/me/avatar
  router.put('/me/avatar', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const { avatar } = avatarSchema.parse(req.body);

    const response: ApiResponse<AvatarResponse> = {
      success: true,
      data: { avatar: getServices().users.setAvatar(user, avatar) },
    };
    res.json(response);
  }));

  // DELETE /api/users/me/avatar
  router.delete('/me/avatar', asyncHandler((req: Request, res: Response) => {
    getServices().users.removeAvatar(requireUser(req));
    res.status(204).end();
  }));

  // POST /api/users/set_password
  router.post('/set_password', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const input = setPasswordSchema.parse(req.body);
    getServices().auth.setPassword(user, input);
    res.status(204).end();
  }));

  // GET /api/users/subscriptions
  router.get('/subscriptions', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const query = subscriptionsQuerySchema.parse(req.query);
    const page = getServices().subscriptions.list(
      user,
      query.limit ?? config.pageSize,
      query.offset,
      query.recipes_limit
    );

    const response: ApiResponse<Paginated<UserWithRecipes>> = { success: true, data: page };
    res.json(response);
  }));

  // GET /api/users/:id
  router.get('/:id', asyncHandler((req: Request, res: Response) => {
    const id = readId(req, 'User');
    const response: ApiResponse<UserProfile> = {
      success: true,
      data: getServices().users.getProfile(id, viewerId(req)),
    };
    res.json(response);
  }));

  // POST /api/users/:id/subscribe
  router.post('/:id/subscribe', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    const authorId = readId(req, 'User');
    const { recipes_limit: recipesLimit } = subscribeQuerySchema.parse(req.query);

    const response: ApiResponse<UserWithRecipes> = {
      success: true,
      data: getServices().subscriptions.subscribe(user, authorId, recipesLimit),
    };
    res.status(201).json(response);
  }));

  // DELETE /api/users/:id/subscribe
  router.delete('/:id/subscribe', asyncHandler((req: Request, res: Response) => {
    const user = requireUser(req);
    getServices().subscriptions.unsubscribe(user, readId(req, 'User'));
    res.status(204).end();
  }));

  return router;
}
