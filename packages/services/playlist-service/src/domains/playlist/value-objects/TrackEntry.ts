/**
 * TrackEntry Value Object
 * One playable item of a playlist: a library track, an ad-hoc URL or a radio
 * stream. Instances are immutable; every change returns a copy.
 */

import { randomUUID } from 'crypto';
import { PlaylistError } from '../../../application/errors';

export type TrackKind = 'library' | 'url' | 'radio';

export type TrackOrigin = 'user' | 'generated';

export interface TrackMetadata {
  title: string;
  artist: string;
  album: string;
  albumArtist?: string;
  compilation?: boolean;
  durationSeconds: number;
  trackNumber?: number;
  disc?: number;
  year?: number;
  genre?: string;
  url?: string;
  rating?: number;
  playCount?: number;
}

/** Metadata announced by a stream while it plays, layered over the stored metadata */
export interface StreamMetadata {
  title?: string;
  artist?: string;
  album?: string;
  durationSeconds?: number;
}

export interface TrackEntryProps {
  id?: string;
  kind: TrackKind;
  metadata: Partial<TrackMetadata> & Pick<TrackMetadata, 'title'>;
  libraryId?: string;
  valid?: boolean;
  streamMetadata?: StreamMetadata;
  origin?: TrackOrigin;
}

export class TrackEntry {
  private constructor(
    readonly id: string,
    readonly kind: TrackKind,
    readonly metadata: Readonly<TrackMetadata>,
    readonly libraryId: string | undefined,
    readonly valid: boolean,
    readonly streamMetadata: Readonly<StreamMetadata> | undefined,
    readonly origin: TrackOrigin
  ) {}

  static create(props: TrackEntryProps): TrackEntry {
    const duration = props.metadata.durationSeconds ?? 0;
    if (!Number.isFinite(duration) || duration < 0) {
      throw PlaylistError.validationError('durationSeconds', 'must be a non-negative number');
    }
    if (props.kind === 'library' && !props.libraryId) {
      throw PlaylistError.validationError('libraryId', 'is required for library entries');
    }

    return new TrackEntry(
      props.id ?? randomUUID(),
      props.kind,
      {
        artist: '',
        album: '',
        ...props.metadata,
        durationSeconds: duration,
      },
      props.libraryId,
      props.valid ?? true,
      props.streamMetadata,
      props.origin ?? 'user'
    );
  }

  static fromUrl(url: string, metadata: Partial<TrackMetadata> = {}): TrackEntry {
    return TrackEntry.create({ kind: 'url', metadata: { title: url, ...metadata, url } });
  }

  static radio(name: string, url: string): TrackEntry {
    return TrackEntry.create({ kind: 'radio', metadata: { title: name, url } });
  }

  /** Metadata with any stream override applied */
  get effectiveMetadata(): TrackMetadata {
    if (!this.streamMetadata) return { ...this.metadata };
    const { title, artist, album, durationSeconds } = this.streamMetadata;
    return {
      ...this.metadata,
      ...(title !== undefined && { title }),
      ...(artist !== undefined && { artist }),
      ...(album !== undefined && { album }),
      ...(durationSeconds !== undefined && { durationSeconds }),
    };
  }

  get isStream(): boolean {
    return this.kind === 'radio';
  }

  /** Same content under a fresh id, for inserting one record twice */
  duplicate(): TrackEntry {
    return new TrackEntry(
      randomUUID(),
      this.kind,
      this.metadata,
      this.libraryId,
      this.valid,
      this.streamMetadata,
      this.origin
    );
  }

  withValidity(valid: boolean): TrackEntry {
    if (valid === this.valid) return this;
    return this.copy({ valid });
  }

  withStreamMetadata(streamMetadata: StreamMetadata): TrackEntry {
    return this.copy({ streamMetadata });
  }

  withoutStreamMetadata(): TrackEntry {
    if (!this.streamMetadata) return this;
    return new TrackEntry(this.id, this.kind, this.metadata, this.libraryId, this.valid, undefined, this.origin);
  }

  withMetadata(metadata: Partial<TrackMetadata>): TrackEntry {
    return this.copy({ metadata: { ...this.metadata, ...metadata } });
  }

  withOrigin(origin: TrackOrigin): TrackEntry {
    if (origin === this.origin) return this;
    return this.copy({ origin });
  }

  private copy(
    changes: Partial<Pick<TrackEntry, 'valid' | 'streamMetadata' | 'origin'>> & { metadata?: TrackMetadata }
  ): TrackEntry {
    return new TrackEntry(
      this.id,
      this.kind,
      changes.metadata ?? this.metadata,
      this.libraryId,
      changes.valid ?? this.valid,
      changes.streamMetadata ?? this.streamMetadata,
      changes.origin ?? this.origin
    );
  }
}

/** Grouping key used by album shuffle and repeat-album: album plus artist, or any compilation */
export function albumKey(entry: TrackEntry): string {
  const metadata = entry.metadata;
  if (metadata.compilation) return `compilation\u0000${metadata.album}`;
  return `${metadata.albumArtist || metadata.artist}\u0000${metadata.album}`;
}

export function artistKey(entry: TrackEntry): string {
  return entry.metadata.albumArtist || entry.metadata.artist;
}
