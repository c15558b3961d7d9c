/**
 * PlaybackOrder Entity
 *
 * Permutation of store indices in play order (the "virtual" order) and the
 * shuffle/repeat traversal over it. The permutation is rebuilt lazily the
 * first time it is read after a structural change or a shuffle-mode change.
 */

import type { DisplayFilter } from '../ports';
import { albumKey, artistKey, type TrackEntry } from '../value-objects';
import type { ItemStore } from './ItemStore';

export const SHUFFLE_MODES = ['off', 'all', 'by-album', 'by-artist'] as const;
export type ShuffleMode = (typeof SHUFFLE_MODES)[number];

export const REPEAT_MODES = ['off', 'track', 'album', 'playlist'] as const;
export type RepeatMode = (typeof REPEAT_MODES)[number];

export type RandomSource = () => number;

type Direction = 1 | -1;

export class PlaybackOrder {
  private _shuffleMode: ShuffleMode = 'off';
  private _repeatMode: RepeatMode = 'off';
  private virtualRows: number[] = [];
  private virtualIndexByRow: number[] = [];
  private builtForGeneration = -1;
  private stale = true;

  constructor(
    private readonly store: ItemStore,
    private readonly random: RandomSource = Math.random
  ) {}

  get shuffleMode(): ShuffleMode {
    return this._shuffleMode;
  }

  get repeatMode(): RepeatMode {
    return this._repeatMode;
  }

  setShuffleMode(mode: ShuffleMode): void {
    if (mode === this._shuffleMode) return;
    this._shuffleMode = mode;
    this.invalidate();
  }

  setRepeatMode(mode: RepeatMode): void {
    this._repeatMode = mode;
  }

  /** Forces a new permutation on the next read, e.g. to draw a fresh shuffle */
  invalidate(): void {
    this.stale = true;
  }

  /** Store indices in play order */
  permutation(): readonly number[] {
    this.ensureBuilt();
    return this.virtualRows;
  }

  virtualIndexOf(row: number): number | null {
    this.ensureBuilt();
    return this.virtualIndexByRow[row] ?? null;
  }

  rowAtVirtualIndex(virtualIndex: number): number | null {
    this.ensureBuilt();
    return this.virtualRows[virtualIndex] ?? null;
  }

  /**
   * The row that plays after `current`, or null at the end of play order.
   * With no current row, the first visible row in play order.
   */
  nextRow(current: number | null, filter?: DisplayFilter): number | null {
    return this.adjacentRow(current, 1, filter);
  }

  previousRow(current: number | null, filter?: DisplayFilter): number | null {
    return this.adjacentRow(current, -1, filter);
  }

  private adjacentRow(current: number | null, direction: Direction, filter?: DisplayFilter): number | null {
    this.ensureBuilt();
    const count = this.virtualRows.length;
    if (count === 0) return null;

    const visible = (row: number) => !filter || filter(row);
    const from = current === null ? null : this.virtualIndexOf(current);

    if (from === null || current === null) {
      if (direction === -1) return null;
      return this.scan(-1, direction, visible, false);
    }

    switch (this._repeatMode) {
      case 'track':
        return current;
      case 'album':
        return this.adjacentInAlbum(from, direction, visible);
      case 'playlist':
        return this.scan(from, direction, visible, true);
      default:
        return this.scan(from, direction, visible, false);
    }
  }

  /**
   * Walks play order from `from` (exclusive) and returns the first row
   * accepted by `accept`. With `wrap`, continues past either end once
   * around.
   */
  private scan(from: number, direction: Direction, accept: (row: number) => boolean, wrap: boolean): number | null {
    const count = this.virtualRows.length;
    for (let step = 1; step <= count; step++) {
      let index = from + direction * step;
      if (index < 0 || index >= count) {
        if (!wrap) return null;
        index = ((index % count) + count) % count;
      }
      const row = this.virtualRows[index];
      if (row !== undefined && accept(row)) return row;
    }
    return null;
  }

  private adjacentInAlbum(from: number, direction: Direction, visible: (row: number) => boolean): number | null {
    const currentRow = this.virtualRows[from];
    if (currentRow === undefined) return null;
    const key = albumKey(this.store.entryAt(currentRow));
    const sameAlbum = (row: number) => visible(row) && albumKey(this.store.entryAt(row)) === key;

    const adjacent = this.scan(from, direction, sameAlbum, false);
    if (adjacent !== null) return adjacent;

    // Wrap to the album's first track going forward, its last going back
    const edge = direction === 1 ? -1 : this.virtualRows.length;
    return this.scan(edge, direction, sameAlbum, false);
  }

  private ensureBuilt(): void {
    if (!this.stale && this.builtForGeneration === this.store.structureGeneration) return;

    const size = this.store.size;
    const identity = Array.from({ length: size }, (_, row) => row);
    const current = this.store.currentRow;

    switch (this._shuffleMode) {
      case 'all':
        this.virtualRows = this.shuffleAll(identity, current);
        break;
      case 'by-album':
        this.virtualRows = this.shuffleGroups(identity, current, albumKey);
        break;
      case 'by-artist':
        this.virtualRows = this.shuffleGroups(identity, current, artistKey);
        break;
      default:
        this.virtualRows = identity;
    }

    this.virtualIndexByRow = new Array<number>(size);
    this.virtualRows.forEach((row, virtualIndex) => {
      this.virtualIndexByRow[row] = virtualIndex;
    });
    this.builtForGeneration = this.store.structureGeneration;
    this.stale = false;
  }

  private shuffleAll(rows: number[], current: number | null): number[] {
    const rest = current === null ? rows : rows.filter(row => row !== current);
    const shuffled = fisherYates(rest, this.random);
    return current === null ? shuffled : [current, ...shuffled];
  }

  /**
   * Groups play in random order; rows keep store order inside a group. The
   * current row's group plays first.
   */
  private shuffleGroups(rows: number[], current: number | null, keyOf: (entry: TrackEntry) => string): number[] {
    const keys = rows.map(row => keyOf(this.store.entryAt(row)));
    const groups = fisherYates([...new Set(keys)], this.random);
    if (current !== null) {
      const currentKey = keys[current];
      const at = groups.findIndex(key => key === currentKey);
      if (at > 0) {
        groups.splice(at, 1);
        groups.unshift(currentKey);
      }
    }

    const rank = new Map(groups.map((key, index) => [key, index]));
    return [...rows].sort((a, b) => (rank.get(keys[a]) ?? 0) - (rank.get(keys[b]) ?? 0) || a - b);
  }
}

export function fisherYates<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
