/**
 * Playlist Service - public surface
 */

export * from './domains/playlist';
export * from './application/errors';
export * from './application/services';
export { loadPlaylistConfig, playlistConfig, type PlaylistConfig } from './config/service-config';
export { UrlTrackResolver } from './infrastructure/clients';
export {
  DrizzleLibraryProvider,
  DrizzlePlaylistBackend,
  InMemoryPlaylistBackend,
  closeDatabase,
  createDrizzleRepository,
  type DatabaseConnection,
} from './infrastructure/database';
export { createApp, type AppDependencies } from './presentation/app';
