/**
 * Request logging and correlation
 */

import type { Request, Response, NextFunction } from 'express';
import { extendContext, generateCorrelationId, runWithContext, type Logger } from '@tracklane/platform-core';
import { SERVICE_NAME } from '../../config/service-config';

export const CORRELATION_HEADER = 'x-correlation-id';

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export const correlationMiddleware = () => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = headerValue(req, CORRELATION_HEADER) ?? generateCorrelationId();
    req.headers[CORRELATION_HEADER] = correlationId;
    res.setHeader(CORRELATION_HEADER, correlationId);
    runWithContext({ correlationId, service: SERVICE_NAME }, next);
  };
};

/** Tags log lines written while handling a playlist route with its id */
export const playlistContextMiddleware = () => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    extendContext({ playlistId: req.params.id });
    next();
  };
};

export const loggingMiddleware = (logger: Logger) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.on('finish', () => {
      const meta = {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
        correlationId: headerValue(req, CORRELATION_HEADER),
      };
      if (res.statusCode >= 500) {
        logger.error('Request failed', meta);
      } else if (res.statusCode >= 400) {
        logger.warn('Request rejected', meta);
      } else {
        logger.debug('Request completed', meta);
      }
    });

    next();
  };
};
