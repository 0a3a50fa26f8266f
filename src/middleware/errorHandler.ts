import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';
import { ValidationError, type ApiError } from '../errors.js';

/**
 * Render any error passed to `next()` as `{ error }` JSON.
 *
 * The status comes from `err.statusCode` (our own errors and body-parser's
 * 400/413 both set it), defaulting to 500. Validation errors also carry the
 * formatted zod issues under `details`.
 */
export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode || 500;
  const message = err.message || 'Internal Server Error';

  if (statusCode >= 500) {
    console.error('Error:', err);
  } else {
    console.warn(`${req.method} ${req.originalUrl} rejected (${statusCode}): ${message}`);
  }

  res.status(statusCode).json({
    error: message,
    ...(err instanceof ValidationError && { details: err.details }),
    ...(env.NODE_ENV === 'development' && { stack: err.stack }),
  });
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not Found' });
}
