/**
 * Playlist Service - Express App Factory
 */

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createErrorHandler } from '@tracklane/platform-core';
import type { PlaylistManager } from '../application/services';
import { getLogger, SERVICE_NAME, serverConfig } from '../config/service-config';
import { correlationMiddleware, loggingMiddleware } from './middleware/logging';
import { createHealthRoutes, createPlaylistRoutes } from './routes';

const logger = getLogger('playlist-service-app');

export interface AppDependencies {
  manager: PlaylistManager;
}

export function createApp({ manager }: AppDependencies): Express {
  const app = express();

  setupMiddleware(app);

  app.use('/', createHealthRoutes(manager));
  app.use('/api/playlists', createPlaylistRoutes(manager));

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: { code: 'NOT_FOUND', message: `Route not found: ${req.method} ${req.path}` },
      timestamp: new Date().toISOString(),
    });
  });
  app.use(createErrorHandler(SERVICE_NAME));

  return app;
}

function setupMiddleware(app: Express): void {
  app.use(helmet());

  const origins = serverConfig.corsAllowedOrigins;
  app.use(
    cors({
      origin: origins.length > 0 ? origins : true,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID'],
    })
  );

  app.use(express.json({ limit: '1mb' }));
  app.use(correlationMiddleware());
  app.use(loggingMiddleware(logger));
}
