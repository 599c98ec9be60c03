import { Request, Response, NextFunction } from 'express';
import { config } from '../config/env';
import { metrics } from '../utils/metrics';

export interface AppError extends Error {
  statusCode?: number;
}

export const createError = (message: string, statusCode: number = 500): AppError => {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  return error;
};

export const isAppError = (error: unknown): error is AppError =>
  error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';

export const notFoundHandler = (req: Request, res: Response, next: NextFunction) => {
  next(createError(`Route not found: ${req.method} ${req.path}`, 404));
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const statusCode = isAppError(err) && err.statusCode ? err.statusCode : 500;

  metrics.recordError(statusCode >= 500 ? 'server' : 'client');

  if (statusCode >= 500) {
    console.error('Unhandled error:', {
      method: req.method,
      path: req.path,
      message: err.message,
      stack: err.stack,
    });
  }

  const message =
    statusCode >= 500 && config.server.nodeEnv === 'production'
      ? 'Internal server error'
      : err.message;

  res.status(statusCode).json({
    error: { message },
  });
};
