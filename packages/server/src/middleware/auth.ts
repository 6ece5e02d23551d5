import type { Request, Response, NextFunction } from 'express';
import { getServices } from '../services/index.js';
import type { UserRecord } from '../repositories/index.js';
import { UnauthorizedError } from '../types/errors.js';

const TOKEN_HEADER = /^Token\s+(\S+)$/i;

/**
 * Resolve `Authorization: Token <key>` to `req.user`. Requests without
 * the header pass through anonymously; a bad or unknown token is a 401.
 */
export function authenticate(req: Request, _res: Response, next: NextFunction): void {
  const header = req.get('authorization');
  if (header === undefined || header === '') {
    next();
    return;
  }

  const key = TOKEN_HEADER.exec(header)?.[1];
  if (key === undefined) {
    throw new UnauthorizedError('Invalid token header.');
  }

  const user = getServices().auth.authenticate(key);
  if (user === null) {
    throw new UnauthorizedError('Invalid token.');
  }

  req.user = user;
  next();
}

export function requireUser(req: Request): UserRecord {
  if (req.user === undefined) {
    throw new UnauthorizedError();
  }
  return req.user;
}

export function viewerId(req: Request): number | null {
  return req.user?.id ?? null;
}
