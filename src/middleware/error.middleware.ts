import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../utils/ApiError';
import logger from '../config/logger';

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const apiError = err instanceof ApiError ? err : new ApiError(500, err.message || 'Internal Server Error', false, err.stack);
  const statusCode = apiError.statusCode || 500;

  const response = {
    success: false,
    message: apiError.message,
    ...(apiError.details !== undefined && { details: apiError.details }),
    ...(process.env.NODE_ENV === 'development' && { stack: apiError.stack }),
  };

  // warn for client errors, error for server faults
  if (statusCode >= 500) {
    logger.error(`${statusCode} - ${apiError.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`, {
      stack: apiError.stack,
    });
  } else {
    logger.warn(`${statusCode} - ${apiError.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(ApiError.notFound(`Route ${req.originalUrl} not found`));
};
