import express from 'express';
import { createResponseHelpers } from '@tracklane/platform-core';
import type { PlaylistManager } from '../../application/services';
import { SERVICE_NAME } from '../../config/service-config';

const { sendSuccess } = createResponseHelpers();

export function createHealthRoutes(manager: PlaylistManager): express.Router {
  const router = express.Router();

  router.get('/health', (_req, res) => {
    sendSuccess(res, {
      status: 'healthy',
      service: SERVICE_NAME,
      openPlaylists: manager.listOpen().length,
      uptime: Math.round(process.uptime()),
    });
  });

  return router;
}
