/**
 * Playlist notifications
 *
 * Synchronous, typed events emitted once a mutation has restored every
 * invariant. Subscribers keep the returned handle and unsubscribe
 * explicitly.
 */

import { EventEmitter } from 'events';
import type { TrackEntry } from '../value-objects';

export type StructureChange =
  | { type: 'inserted'; start: number; count: number }
  | { type: 'removed'; start: number; count: number }
  /** `mapping[oldRow]` is the row's new index */
  | { type: 'moved'; mapping: number[] }
  | { type: 'reset' };

export interface PlaylistEvents {
  structureChanged: StructureChange;
  /** Inclusive row range whose entries changed in place */
  dataChanged: { first: number; last: number };
  /** Rows and entries before and after; a removed current row reports `previous` as its old index */
  currentChanged: {
    previous: number | null;
    current: number | null;
    previousEntry: TrackEntry | null;
    currentEntry: TrackEntry | null;
  };
  dynamicModeChanged: { dynamic: boolean };
  loadError: { message: string };
  playRequested: { row: number };
  restoreFinished: { itemCount: number };
}

export type PlaylistEventName = keyof PlaylistEvents;

export interface Subscription {
  unsubscribe(): void;
}

export class PlaylistNotifier {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends PlaylistEventName>(event: K, listener: (payload: PlaylistEvents[K]) => void): Subscription {
    this.emitter.on(event, listener);
    let active = true;
    return {
      unsubscribe: () => {
        if (!active) return;
        active = false;
        this.emitter.off(event, listener);
      },
    };
  }

  emit<K extends PlaylistEventName>(event: K, payload: PlaylistEvents[K]): void {
    this.emitter.emit(event, payload);
  }

  listenerCount(event: PlaylistEventName): number {
    return this.emitter.listenerCount(event);
  }

  removeAll(): void {
    this.emitter.removeAllListeners();
  }
}
