import type { PlaylistConfig } from '../config/service-config';
import type { RandomSource } from '../domains/playlist/entities/PlaybackOrder';
import type { GenerateResult, GeneratorReference, TrackGenerator } from '../domains/playlist/ports';
import { TrackEntry, type TrackMetadata } from '../domains/playlist/value-objects';

export const testConfig: PlaylistConfig = {
  undoLimit: 100,
  undoItemLimit: 500,
  dynamicHistory: 5,
  dynamicLookahead: 10,
  vetoGeneratedTracks: true,
};

export function track(title: string, metadata: Partial<TrackMetadata> = {}): TrackEntry {
  return TrackEntry.create({ kind: 'url', metadata: { title, url: `http://media.test/${title}.mp3`, ...metadata } });
}

export function libraryTrack(libraryId: string, metadata: Partial<TrackMetadata> = {}): TrackEntry {
  return TrackEntry.create({ kind: 'library', libraryId, metadata: { title: libraryId, ...metadata } });
}

export function titles(entries: readonly TrackEntry[]): string[] {
  return entries.map(entry => entry.metadata.title);
}

/** Always answers 0, which makes Fisher-Yates rotate the list left by one */
export const zeroRandom: RandomSource = () => 0;

/** Scripted generator: each call returns the next batch, then reports exhaustion */
export class ScriptedGenerator implements TrackGenerator {
  readonly reference: GeneratorReference = { type: 'scripted', config: {} };
  readonly calls: number[] = [];
  private produced = 0;

  constructor(
    readonly isDynamic: boolean,
    private readonly perCall: number,
    private readonly limit = Number.POSITIVE_INFINITY,
    readonly dynamicHistory?: number,
    readonly dynamicLookahead?: number
  ) {}

  async generate(count: number): Promise<GenerateResult> {
    this.calls.push(count);
    if (this.produced >= this.limit) return { status: 'exhausted' };
    const batch = Math.min(this.perCall, count, this.limit - this.produced);
    const entries = Array.from({ length: batch }, () => track(`G${++this.produced}`, { durationSeconds: 180 }));
    return { status: 'ok', entries };
  }
}
