/**
 * PlaylistManager
 * Owns the open playlists and moves them to and from the backend store.
 */

import { randomUUID } from 'crypto';
import { DomainError, serializeError } from '@tracklane/platform-core';
import { getLogger, playlistConfig, type PlaylistConfig } from '../../config/service-config';
import {
  Playlist,
  type ILibraryProvider,
  type IPlaylistBackend,
  type IUrlResolver,
  type PlaylistSummary,
  type TrackGeneratorFactory,
} from '../../domains/playlist';
import { PlaylistError } from '../errors';

const logger = getLogger('playlist-service-manager');

export interface PlaylistManagerDeps {
  backend: IPlaylistBackend;
  libraryProvider?: ILibraryProvider;
  urlResolver?: IUrlResolver;
  generatorFactory?: TrackGeneratorFactory;
  config?: PlaylistConfig;
}

export class PlaylistManager {
  private readonly playlists = new Map<string, Playlist>();

  constructor(private readonly deps: PlaylistManagerDeps) {}

  create(name: string, id: string = randomUUID()): Playlist {
    if (this.playlists.has(id)) {
      throw PlaylistError.playlistAlreadyExists(id);
    }
    const playlist = this.build(id, name);
    this.playlists.set(id, playlist);
    logger.info('Playlist created', { playlistId: id, name });
    return playlist;
  }

  find(id: string): Playlist | undefined {
    return this.playlists.get(id);
  }

  get(id: string): Playlist {
    const playlist = this.playlists.get(id);
    if (!playlist) {
      throw PlaylistError.playlistNotFound(id);
    }
    return playlist;
  }

  /** Returns the open playlist, restoring it from the backend when needed */
  async open(id: string): Promise<Playlist> {
    return this.playlists.get(id) ?? this.restore(id);
  }

  listOpen(): PlaylistSummary[] {
    return [...this.playlists.values()].map(playlist => ({
      id: playlist.id,
      name: playlist.name,
      itemCount: playlist.size,
    }));
  }

  async listStored(): Promise<PlaylistSummary[]> {
    return this.withBackend('list playlists', () => this.deps.backend.list());
  }

  async save(id: string): Promise<void> {
    const playlist = this.get(id);
    await this.withBackend('save playlist', () => this.deps.backend.save(id, playlist.snapshot()));
    logger.info('Playlist saved', { playlistId: id, items: playlist.size });
  }

  async restore(id: string): Promise<Playlist> {
    const snapshot = await this.withBackend('load playlist', () => this.deps.backend.load(id));
    if (!snapshot) {
      throw PlaylistError.playlistNotFound(id);
    }

    const playlist = this.playlists.get(id) ?? this.build(id, snapshot.name);
    await playlist.restore(snapshot);
    this.playlists.set(id, playlist);
    return playlist;
  }

  async remove(id: string, options: { deleteStored?: boolean } = {}): Promise<void> {
    const playlist = this.get(id);
    playlist.dispose();
    this.playlists.delete(id);
    if (options.deleteStored) {
      await this.withBackend('delete playlist', () => this.deps.backend.delete(id));
    }
    logger.info('Playlist removed', { playlistId: id, deleteStored: options.deleteStored ?? false });
  }

  private build(id: string, name: string): Playlist {
    return new Playlist(id, name, {
      config: this.deps.config ?? playlistConfig,
      libraryProvider: this.deps.libraryProvider,
      urlResolver: this.deps.urlResolver,
      generatorFactory: this.deps.generatorFactory,
    });
  }

  private async withBackend<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof DomainError) throw error;
      logger.error(`Failed to ${operation}`, { error: serializeError(error) });
      throw PlaylistError.persistenceFailed(operation, error instanceof Error ? error : undefined);
    }
  }
}
