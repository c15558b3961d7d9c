/**
 * DrizzleLibraryProvider
 * Resolves library records from pls_library_tracks
 */

import { eq, inArray } from 'drizzle-orm';
import { getLogger } from '../../config/service-config';
import { TrackEntry, type ILibraryProvider } from '../../domains/playlist';
import { libraryTracks, type LibraryTrackRow } from '../../schema/playlist-schema';
import type { DatabaseConnection } from './DatabaseConnectionFactory';

const logger = getLogger('playlist-service-drizzle-library-provider');

export function toTrackEntry(row: LibraryTrackRow): TrackEntry {
  return TrackEntry.create({
    kind: 'library',
    libraryId: row.id,
    valid: !row.unavailable,
    metadata: {
      title: row.title,
      artist: row.artist,
      album: row.album,
      albumArtist: row.albumArtist ?? undefined,
      compilation: row.compilation,
      durationSeconds: row.durationSeconds,
      trackNumber: row.trackNumber ?? undefined,
      disc: row.disc ?? undefined,
      year: row.year ?? undefined,
      genre: row.genre ?? undefined,
      url: row.url ?? undefined,
      rating: row.rating ?? undefined,
      playCount: row.playCount,
    },
  });
}

export class DrizzleLibraryProvider implements ILibraryProvider {
  constructor(private readonly db: DatabaseConnection) {}

  async findByIds(libraryIds: string[]): Promise<TrackEntry[]> {
    if (libraryIds.length === 0) return [];
    const rows = await this.db.select().from(libraryTracks).where(inArray(libraryTracks.id, libraryIds));
    logger.debug('Library records resolved', { requested: libraryIds.length, found: rows.length });
    return rows.map(toTrackEntry);
  }

  async saveRating(libraryId: string, rating: number): Promise<void> {
    await this.db
      .update(libraryTracks)
      .set({ rating, updatedAt: new Date() })
      .where(eq(libraryTracks.id, libraryId));
  }
}
