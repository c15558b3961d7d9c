/**
 * DynamicPlaylistController
 *
 * Keeps a generator-fed playlist topped up: a fixed number of unplayed
 * entries ahead of the current one, and at most `history` played entries
 * behind it. Every change it makes bypasses undo.
 */

import { serializeError } from '@tracklane/platform-core';
import { getLogger } from '../../../config/service-config';
import type { ItemStore } from '../entities/ItemStore';
import type { PlaybackOrder } from '../entities/PlaybackOrder';
import type { PlaylistNotifier } from '../events/PlaylistNotifier';
import type { GeneratorReference, TrackGenerator } from '../ports';
import type { MutationLog } from '../undo';
import type { InsertionPipeline } from './InsertionPipeline';

const logger = getLogger('playlist-service-dynamic-playlist');

export type DynamicState = 'inactive' | 'active';

export interface DynamicPlaylistDeps {
  playlistId: string;
  store: ItemStore;
  order: PlaybackOrder;
  log: MutationLog;
  notifier: PlaylistNotifier;
  pipeline: InsertionPipeline;
  currentEpoch: () => number;
  defaultHistory: number;
  defaultLookahead: number;
  vetoGeneratedTracks: boolean;
}

export class DynamicPlaylistController {
  private generator: TrackGenerator | null = null;
  private history: number;
  private lookahead: number;
  /** Changes on every activation and deactivation */
  private session = 0;
  private work: Promise<void> = Promise.resolve();

  constructor(private readonly deps: DynamicPlaylistDeps) {
    this.history = deps.defaultHistory;
    this.lookahead = deps.defaultLookahead;
  }

  get state(): DynamicState {
    return this.generator ? 'active' : 'inactive';
  }

  get isActive(): boolean {
    return this.generator !== null;
  }

  get historyWatermark(): number {
    return this.history;
  }

  get lookaheadSize(): number {
    return this.lookahead;
  }

  get reference(): GeneratorReference | null {
    return this.generator?.reference ?? null;
  }

  /**
   * Activates the generator and fills the lookahead. Resolves once the
   * initial fill has finished (or was abandoned).
   */
  turnOn(generator: TrackGenerator): Promise<void> {
    this.activate(generator);
    return this.schedule(() => this.topUp());
  }

  /** Reactivates a generator restored with its playlist, without generating */
  resume(generator: TrackGenerator): void {
    this.activate(generator);
  }

  /** Generated entries left in the playlist become ordinary entries */
  turnOff(): void {
    if (!this.generator) return;
    this.generator = null;
    this.session++;

    const { store } = this.deps;
    for (let row = 0; row < store.size; row++) {
      if (store.entryAt(row).origin === 'generated') {
        store.updateEntry(row, entry => entry.withOrigin('user'));
      }
    }

    logger.info('Dynamic playlist deactivated', { playlistId: this.deps.playlistId });
    this.deps.notifier.emit('dynamicModeChanged', { dynamic: false });
  }

  private activate(generator: TrackGenerator): void {
    if (this.generator) this.turnOff();

    this.generator = generator;
    this.session++;
    this.history = generator.dynamicHistory ?? this.deps.defaultHistory;
    this.lookahead = generator.dynamicLookahead ?? this.deps.defaultLookahead;
    this.deps.order.setShuffleMode('off');

    logger.info('Dynamic playlist activated', {
      playlistId: this.deps.playlistId,
      generator: generator.reference.type,
      history: this.history,
      lookahead: this.lookahead,
    });
    this.deps.notifier.emit('dynamicModeChanged', { dynamic: true });
  }

  /** Called after the current row changed while playing forward */
  onCurrentAdvanced(): Promise<void> {
    if (!this.generator) return this.work;
    return this.schedule(async () => {
      this.trimHistory();
      await this.topUp();
    });
  }

  /** Replaces the unplayed future with fresh generator output */
  repopulate(): Promise<void> {
    if (!this.generator) return this.work;
    return this.schedule(async () => {
      const { store } = this.deps;
      const firstFuture = (store.currentRow ?? -1) + 1;
      if (firstFuture < store.size) {
        this.removeWithoutUndo(firstFuture, store.size - firstFuture);
      }
      await this.topUp();
    });
  }

  /** Resolves when queued maintenance has finished */
  idle(): Promise<void> {
    return this.work;
  }

  private schedule(task: () => Promise<void>): Promise<void> {
    this.work = this.work.then(task).catch(error => {
      logger.error('Dynamic playlist maintenance failed', {
        playlistId: this.deps.playlistId,
        error: serializeError(error),
      });
    });
    return this.work;
  }

  private trimHistory(): void {
    const current = this.deps.store.currentRow;
    if (current === null || current <= this.history) return;
    this.removeWithoutUndo(0, current - this.history);
  }

  private async topUp(): Promise<void> {
    const session = this.session;
    const epoch = this.deps.currentEpoch();

    let deficit = this.lookahead - this.futureCount();
    while (deficit > 0) {
      const generator = this.generator;
      if (!generator) return;

      const result = await generator.generate(deficit);
      if (session !== this.session || epoch !== this.deps.currentEpoch()) {
        logger.debug('Dropping stale generator output', { playlistId: this.deps.playlistId });
        return;
      }

      if (result.status === 'exhausted') {
        logger.info('Generator exhausted', { playlistId: this.deps.playlistId });
        this.turnOff();
        return;
      }
      if (result.entries.length === 0) return;

      const inserted = this.deps.pipeline.insertEntries(result.entries, {
        undoable: false,
        origin: 'generated',
        applyVeto: this.deps.vetoGeneratedTracks,
      });
      if (inserted.count === 0) return;

      deficit = this.lookahead - this.futureCount();
    }
  }

  private futureCount(): number {
    const { store } = this.deps;
    return store.size - (store.currentRow ?? -1) - 1;
  }

  private removeWithoutUndo(position: number, count: number): void {
    this.deps.store.remove(position, count);
    this.deps.log.clear();
  }
}
