import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { error as logError, warn } from 'firebase-functions/logger';
import type { ApiError } from '@foodgram/shared';
import { AppError } from '../types/errors.js';
import { isUniqueConstraintError } from '../db/row-guards.js';

/** The 4xx status body-parser attaches to errors it raises for bad requests. */
function bodyParserStatus(err: Error): number | null {
  if (!('type' in err) || !('status' in err)) {
    return null;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function send(res: Response, status: number, error: ApiError['error']): void {
  const response: ApiError = { success: false, error };
  res.status(status).json(response);
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    warn('Request validation failed', { path: req.originalUrl, issues: err.errors });
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Invalid request data',
      details: err.errors,
    });
    return;
  }

  // Handle known application errors
  if (err instanceof AppError) {
    warn('Request failed', { path: req.originalUrl, status: err.statusCode, message: err.message });
    const error: ApiError['error'] = { code: err.code, message: err.message };
    if (err.details !== undefined) {
      error.details = err.details;
    }
    send(res, err.statusCode, error);
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    send(res, 400, { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
    return;
  }

  // Other body-parser rejections, such as an oversized body
  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== null) {
    warn('Request body rejected', { path: req.originalUrl, status: parserStatus, message: err.message });
    if (parserStatus === 413) {
      send(res, 413, { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' });
    } else {
      send(res, parserStatus, { code: 'VALIDATION_ERROR', message: err.message });
    }
    return;
  }

  // Constraint races that slipped past the service checks
  if (isUniqueConstraintError(err)) {
    warn('Unique constraint violated', { path: req.originalUrl, message: err.message });
    send(res, 409, { code: 'CONFLICT', message: 'A record with this value already exists' });
    return;
  }

  logError('Unhandled error', err);
  send(res, 500, { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
}
