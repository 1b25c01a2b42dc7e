// middleware/errorMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import AppError from '../utils/AppError';
import { RunInProgressError } from '../utils/errors';

const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  // 1. Log the Error
  // Non-operational errors are bugs: log the whole thing
  if (!(err instanceof AppError)) {
    logger.error({ err }, `🔥 Unexpected Error [${req.method} ${req.url}]`);
  } else {
    logger.warn(`⚠️ Operational Error [${req.method} ${req.url}]: ${err.message}`);
  }

  // 2. Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ status: 'fail', message: 'Malformed JSON body' });
  }

  // 3. Send Response
  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const status = err instanceof AppError ? err.status : 'error';
  const message = err instanceof AppError ? err.message : 'Internal Server Error';
  const stack = err instanceof Error ? err.stack : undefined;

  res.status(statusCode).json({
    status,
    error: err instanceof AppError ? err.name : 'InternalError',
    message,
    ...(err instanceof RunInProgressError ? { activeRunId: err.activeRunId } : {}),
    // Only show stack in development
    stack: process.env.NODE_ENV === 'development' ? stack : undefined,
  });
};

export { errorHandler };
