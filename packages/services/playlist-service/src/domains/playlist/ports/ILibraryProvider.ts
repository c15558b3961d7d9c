import type { TrackEntry } from '../value-objects';

export interface ILibraryProvider {
  /** Resolves library records; ids with no record are absent from the result */
  findByIds(libraryIds: string[]): Promise<TrackEntry[]>;
  saveRating?(libraryId: string, rating: number): Promise<void>;
}
