import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { AppError } from '../errors';
import { logger } from '../utils/logger';

export { AppError };

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const errorCode = err instanceof AppError ? err.code : 'INTERNAL_ERROR';
  const message = err.message || 'Internal server error';
  const isDevelopment = config.server.env === 'development';

  logger.error('Error occurred', {
    statusCode,
    errorCode,
    message,
    path: req.path,
    method: req.method,
    ip: req.ip,
    stack: isDevelopment ? err.stack : undefined,
  });

  res.status(statusCode).json({
    error: {
      code: errorCode,
      message,
      statusCode,
      timestamp: new Date().toISOString(),
      path: req.path,
    },
    ...(isDevelopment && { stack: err.stack }),
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn(`Route not found: ${req.method} ${req.path}`);
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: 'Route not found',
      statusCode: 404,
      timestamp: new Date().toISOString(),
      path: req.path,
    },
  });
};
