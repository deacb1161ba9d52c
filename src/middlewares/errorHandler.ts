import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/AppError';
import logger from '../utils/logger';
import { env } from '../config';
import type { ApiResponse } from '../types';

/**
 * body-parser reports malformed JSON as a SyntaxError carrying the raw body.
 */
function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const appError =
    err instanceof AppError
      ? err
      : isMalformedJson(err)
        ? AppError.validation('Malformed JSON body')
        : AppError.internal('Internal Server Error');

  if (!appError.isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${appError.message}`);
  }

  const body: ApiResponse & { stack?: string } = {
    success: false,
    error: appError.message,
    code: appError.code,
    ...(appError.details && { details: appError.details }),
    ...(env.NODE_ENV === 'development' && { stack: err.stack }),
    timestamp: new Date().toISOString(),
  };

  res.status(appError.statusCode).json(body);
};

export default errorHandler;
