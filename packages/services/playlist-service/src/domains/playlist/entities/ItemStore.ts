/**
 * ItemStore Entity
 *
 * Ordered sequence of track entries in display order, plus the reverse index
 * from library records to the rows that reference them and the three
 * playback pointers (current, last played, stop after).
 *
 * Store indices renumber on every structural change. Anything that must
 * survive a mutation holds an ItemRef instead.
 */

import { PlaylistError } from '../../../application/errors';
import type { PlaylistNotifier } from '../events/PlaylistNotifier';
import { ItemRef, type TrackEntry } from '../value-objects';

export interface StoredItem {
  readonly ref: ItemRef;
  readonly entry: TrackEntry;
}

export interface InsertedRange {
  start: number;
  count: number;
}

/**
 * Raw access for the mutation log. Commands re-attach the very items they
 * detached, so refs held elsewhere stay meaningful across undo and redo.
 */
export interface ItemStoreInternals {
  attach(position: number | undefined, items: readonly StoredItem[]): InsertedRange;
  detach(position: number, count: number): StoredItem[];
  relocate(sources: readonly number[], destination: number): number;
  relocateBlock(start: number, destinations: readonly number[]): void;
  reorder(order: readonly StoredItem[]): void;
  items(): readonly StoredItem[];
}

export const ITEM_STORE_INTERNALS = Symbol('ItemStoreInternals');

export class ItemStore {
  private items: StoredItem[] = [];
  private readonly libraryIndex = new Map<string, Set<ItemRef>>();
  private rowByKey = new Map<number, number>();
  private generation = 0;
  private indexedGeneration = 0;

  private current: ItemRef | null = null;
  private lastPlayed: ItemRef | null = null;
  private stopAfter: ItemRef | null = null;

  constructor(private readonly notifier: PlaylistNotifier) {}

  get size(): number {
    return this.items.length;
  }

  /** Bumped on every structural change */
  get structureGeneration(): number {
    return this.generation;
  }

  entryAt(row: number): TrackEntry {
    return this.itemAt(row).entry;
  }

  refAt(row: number): ItemRef {
    return this.itemAt(row).ref;
  }

  entries(): TrackEntry[] {
    return this.items.map(item => item.entry);
  }

  indexOf(ref: ItemRef | null): number | null {
    if (!ref) return null;
    if (this.indexedGeneration !== this.generation) {
      this.rowByKey = new Map(this.items.map((item, row) => [item.ref.key, row]));
      this.indexedGeneration = this.generation;
    }
    return this.rowByKey.get(ref.key) ?? null;
  }

  entryFor(ref: ItemRef): TrackEntry | null {
    const row = this.indexOf(ref);
    return row === null ? null : this.entryAt(row);
  }

  rowsForLibraryId(libraryId: string): number[] {
    const refs = this.libraryIndex.get(libraryId);
    if (!refs) return [];
    const rows: number[] = [];
    for (const ref of refs) {
      const row = this.indexOf(ref);
      if (row !== null) rows.push(row);
    }
    return rows.sort((a, b) => a - b);
  }

  libraryIds(): string[] {
    return [...this.libraryIndex.keys()];
  }

  get totalLengthSeconds(): number {
    return this.items.reduce((sum, item) => sum + item.entry.effectiveMetadata.durationSeconds, 0);
  }

  // ===== POINTERS =====

  get currentRow(): number | null {
    return this.indexOf(this.current);
  }

  get lastPlayedRow(): number | null {
    return this.indexOf(this.lastPlayed);
  }

  get stopAfterRow(): number | null {
    return this.indexOf(this.stopAfter);
  }

  get currentRef(): ItemRef | null {
    return this.current;
  }

  setCurrentRow(row: number | null): void {
    const previous = this.currentRow;
    const previousEntry = previous === null ? null : this.entryAt(previous);
    const next = row === null ? null : this.refAt(row);
    this.current = next;
    if (previous !== row) {
      this.notifier.emit('currentChanged', {
        previous,
        current: row,
        previousEntry,
        currentEntry: row === null ? null : this.entryAt(row),
      });
    }
  }

  setLastPlayedRow(row: number | null): void {
    this.lastPlayed = row === null ? null : this.refAt(row);
  }

  setStopAfterRow(row: number | null): void {
    this.stopAfter = row === null ? null : this.refAt(row);
  }

  // ===== MUTATIONS =====

  /**
   * Inserts at `position`; an undefined, negative or past-the-end position
   * appends.
   */
  insert(position: number | undefined, entries: readonly TrackEntry[]): InsertedRange {
    return this.attach(
      position,
      entries.map(entry => ({ ref: ItemRef.issue(), entry }))
    );
  }

  remove(position: number, count: number): TrackEntry[] {
    return this.detach(position, count).map(item => item.entry);
  }

  /**
   * Moves the rows in `sources` (any order, not necessarily contiguous) so
   * that they form one block starting at `destination` in the resulting
   * order, keeping their relative order. Returns the block's start.
   */
  move(sources: readonly number[], destination: number): number {
    return this.relocate(sources, destination);
  }

  /**
   * Inverse shape of {@link move}: the k-th row of the block at `start`
   * ends at `destinations[k]`.
   */
  moveBlock(start: number, destinations: readonly number[]): void {
    this.relocateBlock(start, destinations);
  }

  updateEntry(row: number, mutate: (entry: TrackEntry) => TrackEntry): TrackEntry {
    const item = this.itemAt(row);
    const updated = mutate(item.entry);
    if (updated === item.entry) return updated;

    this.unindexLibrary(item);
    const replacement: StoredItem = { ref: item.ref, entry: updated };
    this.items[row] = replacement;
    this.indexLibrary(replacement);
    this.notifier.emit('dataChanged', { first: row, last: row });
    return updated;
  }

  [ITEM_STORE_INTERNALS](): ItemStoreInternals {
    return {
      attach: (position, items) => this.attach(position, items),
      detach: (position, count) => this.detach(position, count),
      relocate: (sources, destination) => this.relocate(sources, destination),
      relocateBlock: (start, destinations) => this.relocateBlock(start, destinations),
      reorder: order => this.reorder(order),
      items: () => this.items,
    };
  }

  // ===== PRIVATE =====

  private itemAt(row: number): StoredItem {
    const item = Number.isInteger(row) ? this.items[row] : undefined;
    if (!item) {
      throw PlaylistError.outOfRange('Row lookup', row, 1, this.items.length);
    }
    return item;
  }

  private attach(position: number | undefined, items: readonly StoredItem[]): InsertedRange {
    const size = this.items.length;
    const start = position === undefined || position < 0 || position > size ? size : Math.floor(position);
    if (items.length === 0) {
      return { start, count: 0 };
    }

    this.items.splice(start, 0, ...items);
    for (const item of items) this.indexLibrary(item);
    this.generation++;

    this.notifier.emit('structureChanged', { type: 'inserted', start, count: items.length });
    return { start, count: items.length };
  }

  private detach(position: number, count: number): StoredItem[] {
    const size = this.items.length;
    if (
      !Number.isInteger(position) ||
      !Number.isInteger(count) ||
      position < 0 ||
      position >= size ||
      count < 0 ||
      position + count > size
    ) {
      throw PlaylistError.outOfRange('Remove', position, count, size);
    }
    if (count === 0) return [];

    const previousCurrent = this.currentRow;
    const previousEntry = previousCurrent === null ? null : this.entryAt(previousCurrent);
    const removed = this.items.splice(position, count);
    for (const item of removed) this.unindexLibrary(item);
    this.generation++;

    const removedKeys = new Set(removed.map(item => item.ref.key));
    const currentRemoved = this.current !== null && removedKeys.has(this.current.key);
    if (currentRemoved) this.current = null;
    if (this.lastPlayed && removedKeys.has(this.lastPlayed.key)) this.lastPlayed = null;
    if (this.stopAfter && removedKeys.has(this.stopAfter.key)) this.stopAfter = null;

    this.notifier.emit('structureChanged', { type: 'removed', start: position, count });
    if (currentRemoved) {
      this.notifier.emit('currentChanged', {
        previous: previousCurrent,
        current: null,
        previousEntry,
        currentEntry: null,
      });
    }
    return removed;
  }

  private relocate(sources: readonly number[], destination: number): number {
    const size = this.items.length;
    const sorted = [...new Set(sources)].sort((a, b) => a - b);
    for (const row of sorted) {
      if (!Number.isInteger(row) || row < 0 || row >= size) {
        throw PlaylistError.outOfRange('Move', row, sorted.length, size);
      }
    }

    const remainingCount = size - sorted.length;
    const start = Math.min(Math.max(0, Math.floor(destination)), remainingCount);
    if (sorted.length === 0) return start;

    const moving = new Set(sorted);
    const moved = sorted.map(row => this.items[row]);
    const remaining = this.items.filter((_, row) => !moving.has(row));
    const order = [...remaining.slice(0, start), ...moved, ...remaining.slice(start)];

    this.applyOrder(order);
    return start;
  }

  private relocateBlock(start: number, destinations: readonly number[]): void {
    const size = this.items.length;
    const count = destinations.length;
    if (!Number.isInteger(start) || start < 0 || start + count > size) {
      throw PlaylistError.outOfRange('Move', start, count, size);
    }
    if (count === 0) return;

    const slots: Array<StoredItem | undefined> = Array.from({ length: size }, () => undefined);
    const block = this.items.slice(start, start + count);
    destinations.forEach((destination, k) => {
      if (!Number.isInteger(destination) || destination < 0 || destination >= size || slots[destination]) {
        throw PlaylistError.outOfRange('Move', destination, count, size);
      }
      slots[destination] = block[k];
    });

    const rest = [...this.items.slice(0, start), ...this.items.slice(start + count)];
    let next = 0;
    const order = slots.map(slot => slot ?? rest[next++]);
    this.applyOrder(order.filter((item): item is StoredItem => item !== undefined));
  }

  private reorder(order: readonly StoredItem[]): void {
    const present = new Set(this.items.map(item => item.ref.key));
    if (order.length !== this.items.length || !order.every(item => present.delete(item.ref.key))) {
      throw PlaylistError.invalidRequest('reorder must be a permutation of the stored items');
    }
    this.applyOrder([...order]);
  }

  private applyOrder(order: StoredItem[]): void {
    const previous = this.items;
    this.items = order;
    this.generation++;

    const mapping = previous.map(item => this.indexOf(item.ref) ?? -1);
    if (mapping.every((row, oldRow) => row === oldRow)) return;
    this.notifier.emit('structureChanged', { type: 'moved', mapping });
  }

  private indexLibrary(item: StoredItem): void {
    const libraryId = item.entry.libraryId;
    if (!libraryId) return;
    const refs = this.libraryIndex.get(libraryId);
    if (refs) {
      refs.add(item.ref);
    } else {
      this.libraryIndex.set(libraryId, new Set([item.ref]));
    }
  }

  private unindexLibrary(item: StoredItem): void {
    const libraryId = item.entry.libraryId;
    if (!libraryId) return;
    const refs = this.libraryIndex.get(libraryId);
    if (!refs) return;
    refs.delete(item.ref);
    if (refs.size === 0) this.libraryIndex.delete(libraryId);
  }
}
