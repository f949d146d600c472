import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/app-error';
import { ErrorCodes } from '../utils/error-codes';
import { logger } from '../lib/logger';
import { config } from '../config';

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code?: string;
    details?: unknown;
    stack?: string;
  };
}

interface ErrorWithStatus extends Error {
  statusCode?: number;
  status?: number;
  code?: string;
  type?: string;
}

const fromHttpError = (err: ErrorWithStatus, statusCode: number): AppError => {
  // body-parser failures carry a status and a `type`
  if (err.type === 'entity.parse.failed') {
    return AppError.badRequest('Malformed JSON body', ErrorCodes.VALIDATION_ERROR);
  }
  if (err.type === 'entity.too.large') {
    return new AppError('Request body too large', 413, ErrorCodes.VALIDATION_ERROR);
  }
  return new AppError(err.message, statusCode, err.code);
};

export const errorHandler = (
  err: ErrorWithStatus,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  let error: AppError;

  if (err instanceof AppError) {
    error = err;
  } else if (err.statusCode || err.status) {
    error = fromHttpError(err, err.statusCode || err.status || 500);
  } else {
    error = AppError.internal(
      config.nodeEnv === 'production' ? 'An unexpected error occurred' : `Error processing text: ${err.message}`,
      ErrorCodes.INTERNAL_ERROR
    );
  }

  if (error.statusCode >= 500) {
    logger.error(`[ErrorHandler] ${req.method} ${req.originalUrl} failed: ${error.message}`, err);
  }

  const response: ErrorResponse = {
    success: false,
    error: {
      message: error.message,
      code: error.code,
      ...(error.details !== undefined && { details: error.details }),
      ...(config.nodeEnv === 'development' && { stack: err.stack }),
    },
  };

  res.status(error.statusCode).json(response);
};
