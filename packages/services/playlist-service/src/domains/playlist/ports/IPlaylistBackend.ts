import type { RepeatMode, ShuffleMode } from '../entities/PlaybackOrder';
import type { TrackMetadata } from '../value-objects';

export type PersistedEntry =
  | { kind: 'library'; libraryId: string }
  | { kind: 'url' | 'radio'; metadata: TrackMetadata };

export interface GeneratorReference {
  type: string;
  config: Record<string, unknown>;
}

export interface PlaylistSnapshot {
  name: string;
  entries: PersistedEntry[];
  currentRow: number | null;
  lastPlayedRow: number | null;
  stopAfterRow: number | null;
  repeatMode: RepeatMode;
  shuffleMode: ShuffleMode;
  dynamic: GeneratorReference | null;
}

export interface PlaylistSummary {
  id: string;
  name: string;
  itemCount: number;
}

export interface IPlaylistBackend {
  load(playlistId: string): Promise<PlaylistSnapshot | null>;
  save(playlistId: string, snapshot: PlaylistSnapshot): Promise<void>;
  list(): Promise<PlaylistSummary[]>;
  delete(playlistId: string): Promise<void>;
}
