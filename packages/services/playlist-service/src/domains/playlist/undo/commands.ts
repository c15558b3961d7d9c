/**
 * Reversible playlist mutations
 *
 * Each command applies itself through the store's internal capability and
 * keeps the stored items it detached, so undo and redo put back the same
 * items (same refs) rather than copies. Items still in the store are only
 * ever addressed by ref key: entries change in place between steps.
 */

import { PlaylistError } from '../../../application/errors';
import { ItemRef, type TrackEntry } from '../value-objects';
import type { ItemStoreInternals, StoredItem } from '../entities/ItemStore';

export interface MutationCommand {
  readonly description: string;
  /** Applies the mutation; called once by execute and again on every redo */
  redo(): void;
  undo(): void;
}

export interface RowRange {
  position: number;
  count: number;
}

export function describeTracks(verb: string, count: number): string {
  return `${verb} ${count} ${count === 1 ? 'track' : 'tracks'}`;
}

export class InsertItemsCommand implements MutationCommand {
  readonly description: string;
  private items: StoredItem[];
  private start: number | null = null;

  constructor(
    private readonly store: ItemStoreInternals,
    private readonly position: number | undefined,
    entries: readonly TrackEntry[]
  ) {
    this.items = entries.map(entry => ({ ref: ItemRef.issue(), entry }));
    this.description = describeTracks('Add', entries.length);
  }

  /** First inserted row, once applied */
  get insertedAt(): number | null {
    return this.start;
  }

  get count(): number {
    return this.items.length;
  }

  get refs(): ItemRef[] {
    return this.items.map(item => item.ref);
  }

  redo(): void {
    this.start = this.store.attach(this.start ?? this.position, this.items).start;
  }

  undo(): void {
    if (this.start === null || this.items.length === 0) return;
    this.items = this.store.detach(this.start, this.items.length);
  }
}

export class RemoveItemsCommand implements MutationCommand {
  readonly description: string;
  private readonly ranges: RowRange[];
  private removed: Array<{ position: number; items: StoredItem[] }> = [];

  constructor(
    private readonly store: ItemStoreInternals,
    ranges: readonly RowRange[]
  ) {
    // Highest first, so earlier ranges keep their positions while later ones go
    this.ranges = [...ranges].sort((a, b) => b.position - a.position);
    this.description = describeTracks(
      'Remove',
      this.ranges.reduce((sum, range) => sum + range.count, 0)
    );
  }

  get removedEntries(): TrackEntry[] {
    return [...this.removed].reverse().flatMap(block => block.items.map(item => item.entry));
  }

  redo(): void {
    this.validate();
    this.removed = this.ranges.map(range => ({
      position: range.position,
      items: this.store.detach(range.position, range.count),
    }));
  }

  undo(): void {
    for (const block of [...this.removed].reverse()) {
      this.store.attach(block.position, block.items);
    }
  }

  private validate(): void {
    const size = this.store.items().length;
    let ceiling = size;
    for (const range of this.ranges) {
      if (range.position < 0 || range.position >= size || range.position + range.count > ceiling) {
        throw PlaylistError.outOfRange('Remove', range.position, range.count, size);
      }
      ceiling = range.position;
    }
  }
}

export class MoveItemsCommand implements MutationCommand {
  readonly description: string;
  private readonly sources: number[];
  private start: number | null = null;

  constructor(
    private readonly store: ItemStoreInternals,
    sources: readonly number[],
    private readonly destination: number
  ) {
    this.sources = [...new Set(sources)].sort((a, b) => a - b);
    this.description = describeTracks('Move', this.sources.length);
  }

  get movedTo(): number | null {
    return this.start;
  }

  redo(): void {
    this.start = this.store.relocate(this.sources, this.destination);
  }

  undo(): void {
    if (this.start === null) return;
    this.store.relocateBlock(this.start, this.sources);
  }
}

/** Replaces the whole display order; used by sort and physical shuffle */
export class ReorderItemsCommand implements MutationCommand {
  private readonly order: number[];
  private previous: number[] = [];

  constructor(
    private readonly store: ItemStoreInternals,
    order: readonly StoredItem[],
    readonly description: string
  ) {
    this.order = order.map(item => item.ref.key);
  }

  redo(): void {
    this.previous = this.store.items().map(item => item.ref.key);
    this.store.reorder(this.resolve(this.order));
  }

  undo(): void {
    this.store.reorder(this.resolve(this.previous));
  }

  private resolve(keys: readonly number[]): StoredItem[] {
    const live = new Map(this.store.items().map(item => [item.ref.key, item]));
    return keys.flatMap(key => {
      const item = live.get(key);
      return item ? [item] : [];
    });
  }
}
