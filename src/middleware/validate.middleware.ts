import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppError } from '../utils/app-error';
import { ErrorCodes } from '../utils/error-codes';

interface ValidationSchema {
  body: z.ZodTypeAny;
}

export const validate = (schema: ValidationSchema) => {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.body = await schema.body.parseAsync(req.body ?? {});
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        const fieldErrors = error.issues.map(issue => ({
          field: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        }));
        const summary = fieldErrors[0]?.message ?? 'Request validation failed';
        return next(AppError.badRequest(summary, ErrorCodes.VALIDATION_ERROR, fieldErrors));
      }
      next(error);
    }
  };
};
