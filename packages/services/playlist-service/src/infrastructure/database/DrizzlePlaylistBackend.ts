/**
 * DrizzlePlaylistBackend
 * Stores playlist snapshots in pls_playlists / pls_playlist_items
 */

import { asc, count, eq } from 'drizzle-orm';
import { PlaylistError } from '../../application/errors';
import { getLogger } from '../../config/service-config';
import type {
  IPlaylistBackend,
  PersistedEntry,
  PlaylistSnapshot,
  PlaylistSummary,
} from '../../domains/playlist';
import {
  persistedEntrySchema,
  playlistItems,
  playlistRowSchema,
  playlists,
  type NewPlaylistItemRow,
  type PlaylistItemRow,
} from '../../schema/playlist-schema';
import type { DatabaseConnection } from './DatabaseConnectionFactory';

const logger = getLogger('playlist-service-drizzle-playlist-backend');

function toItemRow(playlistId: string, entry: PersistedEntry, position: number): NewPlaylistItemRow {
  if (entry.kind === 'library') {
    return { playlistId, position, kind: entry.kind, libraryId: entry.libraryId, metadata: null };
  }
  return { playlistId, position, kind: entry.kind, libraryId: null, metadata: entry.metadata };
}

function fromItemRow(row: PlaylistItemRow): PersistedEntry {
  const parsed = persistedEntrySchema.safeParse({
    kind: row.kind,
    libraryId: row.libraryId ?? undefined,
    metadata: row.metadata ?? undefined,
  });
  if (!parsed.success) {
    throw PlaylistError.invalidSnapshot(`item ${row.position}: ${parsed.error.errors[0]?.message ?? 'malformed'}`);
  }
  return parsed.data;
}

export class DrizzlePlaylistBackend implements IPlaylistBackend {
  constructor(private readonly db: DatabaseConnection) {}

  async load(playlistId: string): Promise<PlaylistSnapshot | null> {
    const [row] = await this.db.select().from(playlists).where(eq(playlists.id, playlistId)).limit(1);
    if (!row) return null;

    const parsed = playlistRowSchema.safeParse(row);
    if (!parsed.success) {
      throw PlaylistError.invalidSnapshot(parsed.error.errors[0]?.message ?? 'malformed playlist row');
    }

    const itemRows = await this.db
      .select()
      .from(playlistItems)
      .where(eq(playlistItems.playlistId, playlistId))
      .orderBy(asc(playlistItems.position));

    const playlist = parsed.data;
    logger.debug('Playlist loaded', { playlistId, items: itemRows.length });
    return {
      name: playlist.name,
      entries: itemRows.map(fromItemRow),
      currentRow: playlist.currentRow,
      lastPlayedRow: playlist.lastPlayedRow,
      stopAfterRow: playlist.stopAfterRow,
      repeatMode: playlist.repeatMode,
      shuffleMode: playlist.shuffleMode,
      dynamic: playlist.dynamicGenerator,
    };
  }

  async save(playlistId: string, snapshot: PlaylistSnapshot): Promise<void> {
    const header = {
      name: snapshot.name,
      currentRow: snapshot.currentRow,
      lastPlayedRow: snapshot.lastPlayedRow,
      stopAfterRow: snapshot.stopAfterRow,
      repeatMode: snapshot.repeatMode,
      shuffleMode: snapshot.shuffleMode,
      dynamicGenerator: snapshot.dynamic,
      updatedAt: new Date(),
    };

    await this.db.transaction(async tx => {
      await tx
        .insert(playlists)
        .values({ id: playlistId, ...header })
        .onConflictDoUpdate({ target: playlists.id, set: header });

      await tx.delete(playlistItems).where(eq(playlistItems.playlistId, playlistId));

      if (snapshot.entries.length > 0) {
        await tx.insert(playlistItems).values(snapshot.entries.map((entry, position) => toItemRow(playlistId, entry, position)));
      }
    });

    logger.debug('Playlist saved', { playlistId, items: snapshot.entries.length });
  }

  async list(): Promise<PlaylistSummary[]> {
    const rows = await this.db
      .select({ id: playlists.id, name: playlists.name, itemCount: count(playlistItems.id) })
      .from(playlists)
      .leftJoin(playlistItems, eq(playlistItems.playlistId, playlists.id))
      .groupBy(playlists.id)
      .orderBy(asc(playlists.name));

    return rows.map(row => ({ id: row.id, name: row.name, itemCount: Number(row.itemCount) }));
  }

  async delete(playlistId: string): Promise<void> {
    await this.db.delete(playlists).where(eq(playlists.id, playlistId));
    logger.info('Playlist deleted', { playlistId });
  }
}
