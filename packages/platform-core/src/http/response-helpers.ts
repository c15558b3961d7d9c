/**
 * Shared Response Helpers
 *
 * Every success payload is wrapped as { success: true, data, timestamp }.
 *
 * Usage:
 *   import { createResponseHelpers } from '@tracklane/platform-core';
 *   const { sendSuccess, sendCreated } = createResponseHelpers();
 */

import type { Response } from 'express';

export interface ServiceResponse<T> {
  success: true;
  data: T;
  timestamp: string;
}

export interface ResponseHelpers {
  sendSuccess: <T>(res: Response, data: T, statusCode?: number) => void;
  sendCreated: <T>(res: Response, data: T) => void;
  sendNoContent: (res: Response) => void;
}

function buildSuccess<T>(data: T): ServiceResponse<T> {
  return { success: true, data, timestamp: new Date().toISOString() };
}

export function createResponseHelpers(): ResponseHelpers {
  return {
    sendSuccess: (res, data, statusCode = 200) => {
      res.status(statusCode).json(buildSuccess(data));
    },
    sendCreated: (res, data) => {
      res.status(201).json(buildSuccess(data));
    },
    sendNoContent: res => {
      res.status(204).end();
    },
  };
}
