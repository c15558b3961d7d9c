import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { serializeError } from '@tracklane/platform-core';
import { getLogger } from '../../config/service-config';

const logger = getLogger('playlist-service-safe');

export function safe(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void> | void
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(handler(req, res, next)).catch((error: unknown) => {
      logger.debug('Route handler failed', {
        method: req.method,
        path: req.path,
        error: serializeError(error),
      });
      next(error);
    });
  };
}
