import type { Request } from 'express';
import { idParamSchema } from '@foodgram/shared';
import { NotFoundError } from '../types/errors.js';

/** Numeric `:id` route parameter; anything else is a 404 for `resource`. */
export function readId(req: Request, resource: string): number {
  const raw = req.params['id'] ?? '';
  const parsed = idParamSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NotFoundError(resource, raw);
  }
  return parsed.data;
}
