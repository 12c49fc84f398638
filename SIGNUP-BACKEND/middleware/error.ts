import { Request, Response, NextFunction } from 'express';
import { SignupError } from '../core/errors';

/**
 * Async error handler wrapper
 * Catches async errors and passes to Express error middleware
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof SignupError) {
    return res.status(err.status).json({ error: err.message, code: err.code });
  }
  console.error('Error:', err);
  return res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}
