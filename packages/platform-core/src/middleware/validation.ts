import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { DomainError, DomainErrorCode } from '../error-handling/errors.js';

function handleZodError(res: Response, error: z.ZodError, serviceName: string, message: string): void {
  const failure = new DomainError(message, 400, {
    code: DomainErrorCode.VALIDATION_ERROR,
    details: {
      service: serviceName,
      errors: error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    },
  });
  res.status(failure.statusCode).json({
    success: false,
    error: failure.toErrorBody(),
    timestamp: new Date().toISOString(),
  });
}

export function createValidateBody(serviceName: string) {
  return function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const result = schema.safeParse(req.body);
      if (!result.success) {
        handleZodError(res, result.error, serviceName, 'Request body validation failed');
        return;
      }
      req.body = result.data;
      next();
    };
  };
}

export function createValidateParams(serviceName: string) {
  return function validateParams<T extends Record<string, string>>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const result = schema.safeParse(req.params);
      if (!result.success) {
        handleZodError(res, result.error, serviceName, 'URL parameters validation failed');
        return;
      }
      req.params = result.data;
      next();
    };
  };
}

export interface ValidationMiddleware {
  validateBody: ReturnType<typeof createValidateBody>;
  validateParams: ReturnType<typeof createValidateParams>;
}

export function createValidation(serviceName: string): ValidationMiddleware {
  return {
    validateBody: createValidateBody(serviceName),
    validateParams: createValidateParams(serviceName),
  };
}
