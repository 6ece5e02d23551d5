import type { UserRecord } from '../repositories/user.repository.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by the authenticate middleware for requests with a valid token. */
      user?: UserRecord;
    }
  }
}

export {};
