/**
 * Playlist service configuration
 */

import { createLogger, getConfig, type Logger } from '@tracklane/platform-core';

export const SERVICE_NAME = 'playlist-service';

export function getLogger(name: string): Logger {
  return createLogger(name.startsWith(SERVICE_NAME) ? name : `${SERVICE_NAME}-${name}`);
}

export interface PlaylistConfig {
  /** Mutation log capacity; oldest commands are dropped past it */
  undoLimit: number;
  /** Batches larger than this are inserted or cleared without an undo step */
  undoItemLimit: number;
  /** Played entries kept before a dynamic playlist trims its history */
  dynamicHistory: number;
  /** Unplayed entries a dynamic playlist keeps ahead of the current one */
  dynamicLookahead: number;
  /** Whether veto listeners review generator output */
  vetoGeneratedTracks: boolean;
}

export function loadPlaylistConfig(): PlaylistConfig {
  return {
    undoLimit: Math.max(1, getConfig('PLAYLIST_UNDO_LIMIT', 100)),
    undoItemLimit: Math.max(1, getConfig('PLAYLIST_UNDO_ITEM_LIMIT', 500)),
    dynamicHistory: Math.max(0, getConfig('PLAYLIST_DYNAMIC_HISTORY', 5)),
    dynamicLookahead: Math.max(1, getConfig('PLAYLIST_DYNAMIC_LOOKAHEAD', 10)),
    vetoGeneratedTracks: getConfig('PLAYLIST_VETO_GENERATED_TRACKS', true),
  };
}

export const playlistConfig: PlaylistConfig = loadPlaylistConfig();

export const serverConfig = {
  port: getConfig('PLAYLIST_SERVICE_PORT', 3040),
  /** Comma-separated; empty allows any origin */
  corsAllowedOrigins: getConfig('CORS_ALLOWED_ORIGINS', '')
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean),
  databaseEnvVar: 'PLAYLIST_DATABASE_URL',
  databaseFallbackEnvVar: 'DATABASE_URL',
};
