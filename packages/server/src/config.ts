import { z } from 'zod';
import { MAX_PAGE_SIZE } from '@foodgram/shared';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_PATH: z.string().min(1).default('./data/foodgram.db'),
  PUBLIC_URL: z.string().url().optional(),
  PAGE_SIZE: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(6),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  /** Base of the short links handed out for recipes. */
  publicUrl: string;
  /** Default `limit` of paginated lists. */
  pageSize: number;
}

/** Throws a ZodError when a variable is set to an invalid value. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse({
    PORT: env['PORT'],
    DATABASE_PATH: env['DATABASE_PATH'],
    PUBLIC_URL: env['PUBLIC_URL'],
    PAGE_SIZE: env['PAGE_SIZE'],
  });

  return {
    port: parsed.PORT,
    databasePath: parsed.DATABASE_PATH,
    publicUrl: parsed.PUBLIC_URL ?? `http://localhost:${String(parsed.PORT)}`,
    pageSize: parsed.PAGE_SIZE,
  };
}
