import type { TrackEntry } from '../value-objects';

export interface IUrlResolver {
  /** Throws when the URL cannot be turned into an entry */
  resolve(url: string): Promise<TrackEntry>;
}
