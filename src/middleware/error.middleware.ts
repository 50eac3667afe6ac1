import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ApiError } from '../utils/ApiError';
import logger from '../config/logger';

const MULTER_MESSAGES: Partial<Record<multer.ErrorCode, string>> = {
  LIMIT_FILE_SIZE: 'File size is too large',
  LIMIT_FILE_COUNT: 'Too many files',
  LIMIT_UNEXPECTED_FILE: 'Unexpected field name',
};

const toApiError = (err: Error): ApiError => {
  if (err instanceof ApiError) return err;
  if (err instanceof multer.MulterError) return ApiError.badRequest(MULTER_MESSAGES[err.code] ?? err.message);
  if (err instanceof SyntaxError && 'body' in err) return ApiError.badRequest('Malformed JSON body');
  return new ApiError(500, err.message || 'Internal Server Error', false, err.stack);
};

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const apiError = toApiError(err);
  const statusCode = apiError.statusCode || 500;

  const response = {
    success: false,
    message: apiError.message,
    ...(process.env.NODE_ENV === 'development' && { stack: apiError.stack }),
  };

  // Log with appropriate severity: warn for 4xx, error for 5xx, info otherwise
  if (statusCode >= 500) {
    logger.error(`${statusCode} - ${apiError.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  } else if (statusCode >= 400) {
    logger.warn(`${statusCode} - ${apiError.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  } else {
    logger.info(`${statusCode} - ${apiError.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(ApiError.notFound(`Route ${req.originalUrl} not found`));
};
