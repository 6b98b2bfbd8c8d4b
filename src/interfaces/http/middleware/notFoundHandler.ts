/**
 * Fallback for unmatched routes: answers 404 through the error handler so the
 * body keeps the `{ status: 'error', message }` shape.
 */
import { NotFoundError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
