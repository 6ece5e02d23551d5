import { Router, type Request, type Response } from 'express';
import { loginSchema, type ApiResponse, type AuthTokenResponse } from '@foodgram/shared';
import { asyncHandler } from '../middleware/async-handler.js';
import { requireUser } from '../middleware/auth.js';
import { getServices } from '../services/index.js';

export function createAuthRouter(): Router {
  const router = Router();

  // POST /api/auth/token/login
  router.post('/token/login', asyncHandler((req: Request, res: Response) => {
    const input = loginSchema.parse(req.body);
    const token = getServices().auth.login(input);

    const response: ApiResponse<AuthTokenResponse> = {
      success: true,
      data: { auth_token: token },
    };
    res.json(response);
  }));

  // POST /api/auth/token/logout
  router.post('/token/logout', asyncHandler((req: Request, res: Response) => {
    getServices().auth.logout(requireUser(req).id);
    res.status(204).end();
  }));

  return router;
}
