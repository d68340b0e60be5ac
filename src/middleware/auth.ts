import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppError } from './errorHandler.js';

export const USER_ID_HEADER = 'x-user-id';

const userIdSchema = z.string().trim().min(1).max(128);

/**
 * Identity boundary. The upstream gateway has already verified the user and
 * forwards the id in a header; nothing here checks credentials.
 */
export function requireUser(req: Request, _res: Response, next: NextFunction): void {
  const parsed = userIdSchema.safeParse(req.get(USER_ID_HEADER));
  if (!parsed.success) {
    next(new AppError(401, 'UNAUTHORIZED', 'Missing verified user id'));
    return;
  }
  req.userId = parsed.data;
  next();
}
