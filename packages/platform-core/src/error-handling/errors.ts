import type { Request, Response, NextFunction } from 'express';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface DomainErrorOptions {
  cause?: unknown;
  code?: string;
  details?: Record<string, unknown>;
}

/** The `error` member of a failed response envelope */
export interface ErrorBody {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  correlationId?: string;
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, statusCode: number = 500, options: DomainErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.code = options.code;
    this.details = options.details;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get isClientError(): boolean {
    return this.statusCode < 500;
  }

  toErrorBody(correlationId?: string): ErrorBody {
    return {
      code: this.code ?? DomainErrorCode.INTERNAL_ERROR,
      message: this.message || 'Internal server error',
      ...(this.details && { details: this.details }),
      ...(correlationId && { correlationId }),
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(message: string, statusCode: number, code: T, cause?: Error, serviceName?: string) {
    super(message, statusCode, { cause, code });
    if (serviceName) this.name = `${serviceName}Error`;
  }
}

/**
 * Codes every service error family must define.
 */
export interface BaseServiceErrorCodes<T extends string> {
  NOT_FOUND: T;
  VALIDATION_ERROR: T;
  CONFLICT: T;
  INTERNAL_ERROR: T;
}

/**
 * Builds a named error class for one service. Its own codes extend the base
 * set; unspecified codes fall back to INTERNAL_ERROR.
 */
export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: BaseServiceErrorCodes<T> & Record<string, T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static conflict(message: string) {
      return new ServiceError(message, 409, domainErrorCodes.CONFLICT);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function wrapError(error: unknown, fallbackMessage = 'Unknown error'): DomainError {
  if (error instanceof DomainError) return error;
  if (error instanceof Error) {
    return new DomainError(error.message, 500, { cause: error });
  }
  return new DomainError(String(error) || fallbackMessage, 500);
}

function resolveCorrelationId(req: Request): string | undefined {
  const header = req.headers['x-correlation-id'] ?? req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

/**
 * Express error middleware: maps DomainError to its status and code
 */
export function createErrorHandler(serviceName: string) {
  return (error: Error, req: Request, res: Response, _next: NextFunction): void => {
    const correlationId = resolveCorrelationId(req);
    const domainError = wrapError(error);

    const logMeta = {
      service: serviceName,
      method: req.method,
      url: req.url,
      correlationId,
      error: serializeError(error),
    };
    if (domainError.isClientError) {
      middlewareLogger.warn('Request failed', logMeta);
    } else {
      middlewareLogger.error('Unhandled error', logMeta);
    }

    res.status(domainError.statusCode).json({
      success: false,
      error: domainError.toErrorBody(correlationId),
      timestamp: new Date().toISOString(),
    });
  };
}
