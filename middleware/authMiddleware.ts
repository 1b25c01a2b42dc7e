// middleware/authMiddleware.ts
import crypto from 'crypto';
import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import AppError from '../utils/AppError';

const secretsMatch = (given: string, expected: string): boolean => {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

/**
 * Admin gate for job routes: `x-admin-key` header or `?key=` query parameter.
 * With no secret configured the routes stay closed.
 */
export const requireAdminSecret = (adminSecret: string | undefined) =>
  (req: Request, res: Response, next: NextFunction) => {
    const header = req.header('x-admin-key');
    const query = typeof req.query.key === 'string' ? req.query.key : undefined;
    const key = header || query;

    if (!adminSecret) {
      logger.warn('🚫 Admin route called but ADMIN_SECRET is not configured');
      return next(new AppError('Unauthorized. Admin access is not configured.', 403));
    }

    if (!key || !secretsMatch(key, adminSecret)) {
      logger.warn(`🚫 Unauthorized Job Access Attempt: ${req.ip}`);
      return next(new AppError('Unauthorized. Invalid Admin Key.', 403));
    }
    next();
  };
