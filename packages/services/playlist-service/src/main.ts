/**
 * Playlist Service - entry point
 */

import { getConfig, serializeError } from '@tracklane/platform-core';
import { PlaylistManager } from './application/services';
import { getLogger, SERVICE_NAME, serverConfig } from './config/service-config';
import type { IPlaylistBackend, ILibraryProvider } from './domains/playlist';
import { UrlTrackResolver } from './infrastructure/clients/UrlTrackResolver';
import { closeDatabase, createDrizzleRepository } from './infrastructure/database/DatabaseConnectionFactory';
import { DrizzleLibraryProvider } from './infrastructure/database/DrizzleLibraryProvider';
import { DrizzlePlaylistBackend } from './infrastructure/database/DrizzlePlaylistBackend';
import { InMemoryPlaylistBackend } from './infrastructure/database/InMemoryPlaylistBackend';
import { createApp } from './presentation/app';

const logger = getLogger(SERVICE_NAME);

function hasDatabase(): boolean {
  return Boolean(getConfig(serverConfig.databaseEnvVar, '') || getConfig(serverConfig.databaseFallbackEnvVar, ''));
}

async function main(): Promise<void> {
  let backend: IPlaylistBackend;
  let libraryProvider: ILibraryProvider | undefined;

  if (hasDatabase()) {
    backend = createDrizzleRepository(DrizzlePlaylistBackend);
    libraryProvider = createDrizzleRepository(DrizzleLibraryProvider);
  } else {
    logger.warn('No database configured; playlists are kept in memory only');
    backend = new InMemoryPlaylistBackend();
  }

  const manager = new PlaylistManager({ backend, libraryProvider, urlResolver: new UrlTrackResolver() });
  const app = createApp({ manager });

  const server = app.listen(serverConfig.port, () => {
    logger.info('Playlist service started', { port: serverConfig.port, persistence: hasDatabase() ? 'postgres' : 'memory' });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Failed to close database', { error: serializeError(error) });
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  logger.error('Failed to start playlist service', { error: serializeError(error) });
  process.exit(1);
});
