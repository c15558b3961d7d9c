import type { TrackEntry } from '../value-objects';
import type { GeneratorReference } from './IPlaylistBackend';

export type GenerateResult = { status: 'ok'; entries: TrackEntry[] } | { status: 'exhausted' };

export interface TrackGenerator {
  readonly isDynamic: boolean;
  /** Persistable description, stored with the playlist and used to recreate the generator */
  readonly reference: GeneratorReference;
  readonly dynamicHistory?: number;
  readonly dynamicLookahead?: number;
  generate(count: number): Promise<GenerateResult>;
}

export type TrackGeneratorFactory = (reference: GeneratorReference) => TrackGenerator | null;
