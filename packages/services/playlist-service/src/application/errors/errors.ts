import { createDomainServiceError } from '@tracklane/platform-core';

export const PlaylistErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  RESOLUTION_FAILED: 'RESOLUTION_FAILED',
  PLAYLIST_NOT_FOUND: 'PLAYLIST_NOT_FOUND',
  PLAYLIST_ALREADY_EXISTS: 'PLAYLIST_ALREADY_EXISTS',
  INVALID_REQUEST: 'INVALID_REQUEST',
  NOTHING_TO_UNDO: 'NOTHING_TO_UNDO',
  NOTHING_TO_REDO: 'NOTHING_TO_REDO',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
  INVALID_SNAPSHOT: 'INVALID_SNAPSHOT',
} as const;

export type PlaylistErrorCodeType = (typeof PlaylistErrorCode)[keyof typeof PlaylistErrorCode];

const PlaylistErrorBase = createDomainServiceError('Playlist', PlaylistErrorCode);

export class PlaylistError extends PlaylistErrorBase {
  static outOfRange(operation: string, position: number, count: number, size: number) {
    return new PlaylistError(
      `${operation} out of range: position ${position}, count ${count}, size ${size}`,
      400,
      PlaylistErrorCode.OUT_OF_RANGE
    );
  }

  static resolutionFailed(source: string, cause?: Error) {
    return new PlaylistError(`Could not resolve ${source}`, 422, PlaylistErrorCode.RESOLUTION_FAILED, cause);
  }

  static playlistNotFound(playlistId: string) {
    return new PlaylistError(`Playlist not found: ${playlistId}`, 404, PlaylistErrorCode.PLAYLIST_NOT_FOUND);
  }

  static playlistAlreadyExists(playlistId: string) {
    return new PlaylistError(`Playlist already exists: ${playlistId}`, 409, PlaylistErrorCode.PLAYLIST_ALREADY_EXISTS);
  }

  static invalidRequest(reason: string) {
    return new PlaylistError(`Invalid request: ${reason}`, 400, PlaylistErrorCode.INVALID_REQUEST);
  }

  static nothingToUndo() {
    return new PlaylistError('Nothing to undo', 409, PlaylistErrorCode.NOTHING_TO_UNDO);
  }

  static nothingToRedo() {
    return new PlaylistError('Nothing to redo', 409, PlaylistErrorCode.NOTHING_TO_REDO);
  }

  static persistenceFailed(operation: string, cause?: Error) {
    return new PlaylistError(`Failed to ${operation}`, 500, PlaylistErrorCode.PERSISTENCE_FAILED, cause);
  }

  static invalidSnapshot(reason: string) {
    return new PlaylistError(`Invalid playlist snapshot: ${reason}`, 500, PlaylistErrorCode.INVALID_SNAPSHOT);
  }
}
