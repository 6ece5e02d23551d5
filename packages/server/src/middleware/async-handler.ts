import type { Request, Response, NextFunction, RequestHandler } from 'express';

type Handler = (req: Request, res: Response, next: NextFunction) => void | Promise<void>;

/** Forward thrown errors and rejected promises to the error handler. */
export function asyncHandler(fn: Handler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    void Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
}
