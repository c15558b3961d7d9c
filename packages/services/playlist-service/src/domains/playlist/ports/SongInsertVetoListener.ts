import type { TrackEntry } from '../value-objects';

/**
 * Reviews a batch before it is inserted. Returns the candidates it rejects;
 * returning nothing (or an empty list) accepts the whole batch.
 */
export interface SongInsertVetoListener {
  review(existing: readonly TrackEntry[], candidates: readonly TrackEntry[]): TrackEntry[];
}
