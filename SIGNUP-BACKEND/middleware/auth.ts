import { Request, Response, NextFunction } from 'express';
import { error } from '../lib/api-utils';

export const INSTRUCTOR_HEADER = 'x-instructor-password';

/**
 * Shared-secret gate for the instructor panel.
 * Plain string equality; there is one instructor and no accounts.
 */
export function requireInstructor(password: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const given = req.header(INSTRUCTOR_HEADER);
    if (given !== password) {
      return error(res, 'Instructor password required', 401);
    }
    return next();
  };
}
