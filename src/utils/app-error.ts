import { ErrorCodes } from './error-codes';

export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public code?: string;
  public details?: unknown;

  constructor(message: string, statusCode: number, code?: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code?: string, details?: unknown): AppError {
    return new AppError(message, 400, code || ErrorCodes.VALIDATION_ERROR, details);
  }

  static notFound(message: string = 'Resource not found', code?: string): AppError {
    return new AppError(message, 404, code || ErrorCodes.NOT_FOUND);
  }

  static internal(message: string = 'Internal server error', code?: string): AppError {
    return new AppError(message, 500, code || ErrorCodes.INTERNAL_ERROR);
  }

  static badGateway(message: string = 'Upstream service error', code?: string): AppError {
    return new AppError(message, 502, code || ErrorCodes.GRAMMAR_SERVICE_ERROR);
  }

  static serviceUnavailable(message: string = 'Service unavailable', code?: string): AppError {
    return new AppError(message, 503, code || ErrorCodes.GRAMMAR_SERVICE_UNAVAILABLE);
  }
}
