/**
 * InsertionPipeline
 *
 * Turns an insertion request into entries, lets the registered veto
 * listeners exclude candidates, and submits what is left as one insert.
 *
 * Resolution that has to wait (library lookups, URL resolution, generators)
 * captures the playlist epoch first; a result that arrives after the epoch
 * moved on is dropped.
 */

import { errorMessage, serializeError } from '@tracklane/platform-core';
import { getLogger } from '../../../config/service-config';
import { ITEM_STORE_INTERNALS, type ItemStore } from '../entities/ItemStore';
import type { PlaylistNotifier } from '../events/PlaylistNotifier';
import type {
  ILibraryProvider,
  IPlaybackQueue,
  IUrlResolver,
  SongInsertVetoListener,
  TrackGenerator,
} from '../ports';
import { InsertItemsCommand, type MutationLog } from '../undo';
import { TrackEntry, type ItemRef, type TrackOrigin } from '../value-objects';

const logger = getLogger('playlist-service-insertion-pipeline');

export interface InsertOptions {
  /** Target row; omitted, negative or past the end appends */
  position?: number;
  /** Make the first inserted row current and ask for playback */
  playNow?: boolean;
  /** Append the inserted rows to the play-next queue */
  enqueue?: boolean;
  /** false inserts without recording an undo step (and clears the log) */
  undoable?: boolean;
  /** false skips the veto listeners */
  applyVeto?: boolean;
  origin?: TrackOrigin;
}

export interface InsertResult {
  start: number;
  count: number;
  refs: ItemRef[];
  rejected: TrackEntry[];
}

export interface RadioStation {
  name: string;
  url: string;
}

export interface VetoRegistration {
  readonly listener: SongInsertVetoListener;
  unregister(): boolean;
}

export interface InsertionPipelineDeps {
  playlistId: string;
  store: ItemStore;
  log: MutationLog;
  queue: IPlaybackQueue;
  notifier: PlaylistNotifier;
  currentEpoch: () => number;
  /** Playlist-level current row change: last played, queue head, scrobble point */
  setCurrentRow: (row: number) => void;
  vetoGeneratedTracks: boolean;
  undoItemLimit: number;
  libraryProvider?: ILibraryProvider;
  urlResolver?: IUrlResolver;
}

export class InsertionPipeline {
  private readonly vetoListeners: SongInsertVetoListener[] = [];

  constructor(private readonly deps: InsertionPipelineDeps) {}

  // ===== VETO REGISTRATION =====

  addVetoListener(listener: SongInsertVetoListener): VetoRegistration {
    this.vetoListeners.push(listener);
    return {
      listener,
      unregister: () => this.removeVetoListener(listener),
    };
  }

  /** Returns false when the listener was not registered */
  removeVetoListener(listener: SongInsertVetoListener): boolean {
    const index = this.vetoListeners.indexOf(listener);
    if (index === -1) {
      logger.debug('Veto listener not registered', { playlistId: this.deps.playlistId });
      return false;
    }
    this.vetoListeners.splice(index, 1);
    return true;
  }

  get vetoListenerCount(): number {
    return this.vetoListeners.length;
  }

  // ===== SOURCES =====

  insertEntries(entries: readonly TrackEntry[], options: InsertOptions = {}): InsertResult {
    const origin = options.origin;
    const candidates = origin ? entries.map(entry => entry.withOrigin(origin)) : entries;
    const rejected = options.applyVeto === false ? [] : this.review(candidates);
    const rejectedIds = new Set(rejected.map(entry => entry.id));
    const accepted = candidates.filter(entry => !rejectedIds.has(entry.id));

    if (rejected.length > 0) {
      logger.debug('Veto listeners rejected candidates', {
        playlistId: this.deps.playlistId,
        rejected: rejected.length,
        accepted: accepted.length,
      });
    }

    const { start, count, refs } = this.submit(accepted, options);

    if (count > 0 && options.enqueue) {
      this.deps.queue.enqueue(Array.from({ length: count }, (_, offset) => start + offset));
    }
    if (count > 0 && options.playNow) {
      this.deps.setCurrentRow(start);
      this.deps.notifier.emit('playRequested', { row: start });
    }

    return { start, count, refs, rejected };
  }

  insertRadioStations(stations: readonly RadioStation[], options: InsertOptions = {}): InsertResult {
    return this.insertEntries(
      stations.map(station => TrackEntry.radio(station.name, station.url)),
      options
    );
  }

  /**
   * Resolves library records, preserving request order. Ids without a
   * record are reported through `loadError` and skipped.
   */
  async insertLibraryItems(libraryIds: readonly string[], options: InsertOptions = {}): Promise<InsertResult | null> {
    const provider = this.deps.libraryProvider;
    if (!provider) {
      this.reportLoadError('No library is available to resolve tracks');
      return null;
    }

    const epoch = this.deps.currentEpoch();
    let records: TrackEntry[];
    try {
      records = await provider.findByIds([...libraryIds]);
    } catch (error) {
      if (this.isStale(epoch, 'library lookup')) return null;
      logger.warn('Library lookup failed', { playlistId: this.deps.playlistId, error: serializeError(error) });
      this.reportLoadError(`Could not load library tracks: ${errorMessage(error)}`);
      return null;
    }
    if (this.isStale(epoch, 'library lookup')) return null;

    const byId = new Map(records.map(entry => [entry.libraryId, entry]));
    const entries: TrackEntry[] = [];
    const seen = new Set<string>();
    for (const libraryId of libraryIds) {
      const entry = byId.get(libraryId);
      if (entry) {
        entries.push(seen.has(libraryId) ? entry.duplicate() : entry);
        seen.add(libraryId);
      } else {
        this.reportLoadError(`Library track not found: ${libraryId}`);
      }
    }
    return this.insertEntries(entries, options);
  }

  /** Resolves each URL independently; failures are reported and omitted */
  async insertUrls(urls: readonly string[], options: InsertOptions = {}): Promise<InsertResult | null> {
    const resolver = this.deps.urlResolver;
    const epoch = this.deps.currentEpoch();

    const outcomes = await Promise.allSettled(
      urls.map(url => (resolver ? resolver.resolve(url) : Promise.resolve(TrackEntry.fromUrl(url))))
    );
    if (this.isStale(epoch, 'URL resolution')) return null;

    const entries: TrackEntry[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        entries.push(outcome.value);
        return;
      }
      logger.warn('URL resolution failed', {
        playlistId: this.deps.playlistId,
        url: urls[index],
        error: serializeError(outcome.reason),
      });
      this.reportLoadError(`Could not load ${urls[index]}: ${errorMessage(outcome.reason)}`);
    });
    return this.insertEntries(entries, options);
  }

  /**
   * Inserts one batch of a non-dynamic generator's output. Veto listeners
   * review it only when `vetoGeneratedTracks` is set.
   */
  async insertGenerated(
    generator: TrackGenerator,
    count: number,
    options: InsertOptions = {}
  ): Promise<InsertResult | 'exhausted' | null> {
    const epoch = this.deps.currentEpoch();
    const result = await generator.generate(count);
    if (this.isStale(epoch, 'generator output')) return null;
    if (result.status === 'exhausted') return 'exhausted';

    return this.insertEntries(result.entries, {
      applyVeto: this.deps.vetoGeneratedTracks,
      ...options,
    });
  }

  // ===== PRIVATE =====

  /** Union of every listener's rejections, in registration order */
  private review(candidates: readonly TrackEntry[]): TrackEntry[] {
    if (this.vetoListeners.length === 0 || candidates.length === 0) return [];

    const existing = this.deps.store.entries();
    const candidateIds = new Set(candidates.map(entry => entry.id));
    const rejected = new Map<string, TrackEntry>();
    for (const listener of [...this.vetoListeners]) {
      for (const entry of listener.review(existing, candidates)) {
        if (candidateIds.has(entry.id) && !rejected.has(entry.id)) {
          rejected.set(entry.id, entry);
        }
      }
    }
    return candidates.filter(entry => rejected.has(entry.id));
  }

  private submit(entries: readonly TrackEntry[], options: InsertOptions): InsertResult {
    const store = this.deps.store;
    const command = new InsertItemsCommand(store[ITEM_STORE_INTERNALS](), options.position, entries);

    if (entries.length === 0) {
      command.redo();
    } else if (options.undoable === false || entries.length > this.deps.undoItemLimit) {
      command.redo();
      this.deps.log.clear();
    } else {
      this.deps.log.execute(command);
    }

    return { start: command.insertedAt ?? store.size, count: command.count, refs: command.refs, rejected: [] };
  }

  private isStale(epoch: number, what: string): boolean {
    if (this.deps.currentEpoch() === epoch) return false;
    logger.debug('Dropping stale async result', { playlistId: this.deps.playlistId, what });
    return true;
  }

  private reportLoadError(message: string): void {
    this.deps.notifier.emit('loadError', { message });
  }
}
