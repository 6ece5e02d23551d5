import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { APP_VERSION, createSuccessResponse } from '@foodgram/shared';
import type { AppConfig } from './config.js';
import { createApiRouter, createShortLinkRouter } from './routes/index.js';
import { authenticate, errorHandler, requestLogger } from './middleware/index.js';
import { AppError } from './types/errors.js';

/** Express app with the full middleware stack. The database must be initialized. */
export function createApp(config: AppConfig): Express {
  const app: Express = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Body parsing; images arrive inline as data URLs
  app.use(express.json({ limit: '10mb' }));

  // Request logging
  app.use(requestLogger);

  app.use(authenticate);

  // API routes
  app.use('/api', createApiRouter(config));
  app.use(createShortLinkRouter());

  // Root endpoint
  app.get('/', (_req: Request, res: Response): void => {
    res.json(
      createSuccessResponse({
        message: 'Foodgram API',
        version: APP_VERSION,
      })
    );
  });

  app.use((req: Request): void => {
    throw new AppError(404, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
  });

  // Error handling (must be last)
  app.use(errorHandler);

  return app;
}
