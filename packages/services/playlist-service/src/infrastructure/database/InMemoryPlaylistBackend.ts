/**
 * InMemoryPlaylistBackend
 * Process-local snapshot store, used when no database is configured.
 */

import type { IPlaylistBackend, PlaylistSnapshot, PlaylistSummary } from '../../domains/playlist';

function cloneSnapshot(snapshot: PlaylistSnapshot): PlaylistSnapshot {
  return structuredClone(snapshot);
}

export class InMemoryPlaylistBackend implements IPlaylistBackend {
  private readonly snapshots = new Map<string, PlaylistSnapshot>();

  async load(playlistId: string): Promise<PlaylistSnapshot | null> {
    const snapshot = this.snapshots.get(playlistId);
    return snapshot ? cloneSnapshot(snapshot) : null;
  }

  async save(playlistId: string, snapshot: PlaylistSnapshot): Promise<void> {
    this.snapshots.set(playlistId, cloneSnapshot(snapshot));
  }

  async list(): Promise<PlaylistSummary[]> {
    return [...this.snapshots.entries()]
      .map(([id, snapshot]) => ({ id, name: snapshot.name, itemCount: snapshot.entries.length }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async delete(playlistId: string): Promise<void> {
    this.snapshots.delete(playlistId);
  }
}
