/**
 * Playlist Entity
 *
 * One playlist: its item store, play order, undo log, play-next queue and
 * dynamic controller, and the operations that coordinate them.
 */

import { serializeError } from '@tracklane/platform-core';
import { PlaylistError } from '../../../application/errors';
import { getLogger, playlistConfig, type PlaylistConfig } from '../../../config/service-config';
import { PlaylistNotifier, type PlaylistEventName, type PlaylistEvents, type Subscription } from '../events/PlaylistNotifier';
import type {
  DisplayFilter,
  ILibraryProvider,
  IPlaybackQueue,
  IUrlResolver,
  PersistedEntry,
  PlaylistSnapshot,
  SongInsertVetoListener,
  TrackGenerator,
  TrackGeneratorFactory,
} from '../ports';
import { DynamicPlaylistController } from '../services/DynamicPlaylistController';
import {
  InsertionPipeline,
  type InsertOptions,
  type InsertResult,
  type RadioStation,
  type VetoRegistration,
} from '../services/InsertionPipeline';
import {
  MoveItemsCommand,
  MutationLog,
  RemoveItemsCommand,
  ReorderItemsCommand,
  type RowRange,
} from '../undo';
import { TrackEntry, type StreamMetadata, type TrackMetadata } from '../value-objects';
import { ITEM_STORE_INTERNALS, ItemStore, type ItemStoreInternals, type StoredItem } from './ItemStore';
import { PlaybackOrder, fisherYates, type RandomSource, type RepeatMode, type ShuffleMode } from './PlaybackOrder';
import { PlaybackQueue } from './PlaybackQueue';

const logger = getLogger('playlist-service-playlist');

export type PlaybackState = 'stopped' | 'playing' | 'paused';

export const SORT_KEYS = ['title', 'artist', 'album', 'duration', 'track', 'year', 'genre'] as const;
export type SortKey = (typeof SORT_KEYS)[number];
export type SortDirection = 'asc' | 'desc';

export interface PlaylistDeps {
  config?: PlaylistConfig;
  libraryProvider?: ILibraryProvider;
  urlResolver?: IUrlResolver;
  queue?: IPlaybackQueue;
  generatorFactory?: TrackGeneratorFactory;
  random?: RandomSource;
}

export interface HistoryState {
  canUndo: boolean;
  canRedo: boolean;
  undoText: string | null;
  redoText: string | null;
  depth: number;
}

const MIN_SCROBBLE_POINT_SECONDS = 31;
const MAX_SCROBBLE_POINT_SECONDS = 240;

function compareText(a: string | undefined, b: string | undefined): number {
  return (a ?? '').localeCompare(b ?? '', undefined, { sensitivity: 'base', numeric: true });
}

function compareNumber(a: number | undefined, b: number | undefined): number {
  return (a ?? 0) - (b ?? 0);
}

const SORTERS: Record<SortKey, (a: TrackMetadata, b: TrackMetadata) => number> = {
  title: (a, b) => compareText(a.title, b.title),
  artist: (a, b) => compareText(a.artist, b.artist),
  album: (a, b) =>
    compareText(a.album, b.album) || compareNumber(a.disc, b.disc) || compareNumber(a.trackNumber, b.trackNumber),
  duration: (a, b) => compareNumber(a.durationSeconds, b.durationSeconds),
  track: (a, b) => compareNumber(a.trackNumber, b.trackNumber),
  year: (a, b) => compareNumber(a.year, b.year),
  genre: (a, b) => compareText(a.genre, b.genre),
};

/** Splits a set of rows into contiguous ranges */
export function toRanges(rows: readonly number[]): RowRange[] {
  const sorted = [...new Set(rows)].sort((a, b) => a - b);
  const ranges: RowRange[] = [];
  for (const row of sorted) {
    const last = ranges.at(-1);
    if (last && last.position + last.count === row) {
      last.count++;
    } else {
      ranges.push({ position: row, count: 1 });
    }
  }
  return ranges;
}

export class Playlist {
  readonly notifier = new PlaylistNotifier();
  readonly store: ItemStore;
  readonly order: PlaybackOrder;
  readonly log: MutationLog;
  readonly queue: IPlaybackQueue;

  private readonly config: PlaylistConfig;
  private readonly pipeline: InsertionPipeline;
  private readonly dynamic: DynamicPlaylistController;
  private readonly random: RandomSource;
  private epoch = 0;
  private displayFilter: DisplayFilter | null = null;
  private _playbackState: PlaybackState = 'stopped';
  private _scrobblePoint: number | null = null;
  private _hasScrobbled = false;

  constructor(
    readonly id: string,
    private _name: string,
    private readonly deps: PlaylistDeps = {}
  ) {
    this.config = deps.config ?? playlistConfig;
    this.random = deps.random ?? Math.random;
    this.store = new ItemStore(this.notifier);
    this.order = new PlaybackOrder(this.store, this.random);
    this.log = new MutationLog(this.config.undoLimit);
    this.queue = deps.queue ?? new PlaybackQueue();

    this.pipeline = new InsertionPipeline({
      playlistId: id,
      store: this.store,
      log: this.log,
      queue: this.queue,
      notifier: this.notifier,
      currentEpoch: () => this.epoch,
      setCurrentRow: row => this.setCurrentRow(row),
      vetoGeneratedTracks: this.config.vetoGeneratedTracks,
      undoItemLimit: this.config.undoItemLimit,
      libraryProvider: deps.libraryProvider,
      urlResolver: deps.urlResolver,
    });
    this.dynamic = new DynamicPlaylistController({
      playlistId: id,
      store: this.store,
      order: this.order,
      log: this.log,
      notifier: this.notifier,
      pipeline: this.pipeline,
      currentEpoch: () => this.epoch,
      defaultHistory: this.config.dynamicHistory,
      defaultLookahead: this.config.dynamicLookahead,
      vetoGeneratedTracks: this.config.vetoGeneratedTracks,
    });

    this.notifier.on('structureChanged', change => {
      switch (change.type) {
        case 'inserted':
          this.queue.rowsInserted(change.start, change.count);
          break;
        case 'removed':
          this.queue.rowsRemoved(change.start, change.count);
          break;
        case 'moved':
          this.queue.rowsMoved(change.mapping);
          break;
        case 'reset':
          this.queue.clear();
          break;
      }
    });
  }

  get name(): string {
    return this._name;
  }

  rename(name: string): void {
    this._name = name;
  }

  on<K extends PlaylistEventName>(event: K, listener: (payload: PlaylistEvents[K]) => void): Subscription {
    return this.notifier.on(event, listener);
  }

  // ===== READS =====

  get size(): number {
    return this.store.size;
  }

  entries(): TrackEntry[] {
    return this.store.entries();
  }

  entryAt(row: number): TrackEntry {
    return this.store.entryAt(row);
  }

  get currentRow(): number | null {
    return this.store.currentRow;
  }

  get currentEntry(): TrackEntry | null {
    const row = this.store.currentRow;
    return row === null ? null : this.store.entryAt(row);
  }

  get lastPlayedRow(): number | null {
    return this.store.lastPlayedRow;
  }

  get stopAfterRow(): number | null {
    return this.store.stopAfterRow;
  }

  get totalLengthSeconds(): number {
    return this.store.totalLengthSeconds;
  }

  get shuffleMode(): ShuffleMode {
    return this.order.shuffleMode;
  }

  get repeatMode(): RepeatMode {
    return this.order.repeatMode;
  }

  get playbackState(): PlaybackState {
    return this._playbackState;
  }

  get isDynamic(): boolean {
    return this.dynamic.isActive;
  }

  get dynamicController(): DynamicPlaylistController {
    return this.dynamic;
  }

  get scrobblePointSeconds(): number | null {
    return this._scrobblePoint;
  }

  get hasScrobbled(): boolean {
    return this._hasScrobbled;
  }

  set hasScrobbled(value: boolean) {
    this._hasScrobbled = value;
  }

  get history(): HistoryState {
    return {
      canUndo: this.log.canUndo,
      canRedo: this.log.canRedo,
      undoText: this.log.undoText,
      redoText: this.log.redoText,
      depth: this.log.depth,
    };
  }

  /** Bumped by clear, restore and dispose; async work from an older epoch is dropped */
  get currentEpoch(): number {
    return this.epoch;
  }

  // ===== INSERTION =====

  addVetoListener(listener: SongInsertVetoListener): VetoRegistration {
    return this.pipeline.addVetoListener(listener);
  }

  removeVetoListener(listener: SongInsertVetoListener): boolean {
    return this.pipeline.removeVetoListener(listener);
  }

  insertEntries(entries: readonly TrackEntry[], options?: InsertOptions): InsertResult {
    return this.pipeline.insertEntries(entries, options);
  }

  insertLibraryItems(libraryIds: readonly string[], options?: InsertOptions): Promise<InsertResult | null> {
    return this.pipeline.insertLibraryItems(libraryIds, options);
  }

  insertUrls(urls: readonly string[], options?: InsertOptions): Promise<InsertResult | null> {
    return this.pipeline.insertUrls(urls, options);
  }

  insertRadioStations(stations: readonly RadioStation[], options?: InsertOptions): InsertResult {
    return this.pipeline.insertRadioStations(stations, options);
  }

  /**
   * A dynamic generator turns the playlist dynamic; any other generator
   * contributes one batch of `count` entries.
   */
  async insertFromGenerator(
    generator: TrackGenerator,
    options: InsertOptions & { count?: number } = {}
  ): Promise<InsertResult | null> {
    if (generator.isDynamic) {
      await this.dynamic.turnOn(generator);
      return null;
    }

    const { count, ...insertOptions } = options;
    const result = await this.pipeline.insertGenerated(generator, count ?? this.config.dynamicLookahead, insertOptions);
    if (result === 'exhausted') {
      this.notifier.emit('loadError', { message: 'The generator has no more tracks' });
      return null;
    }
    return result;
  }

  // ===== REMOVAL & MOVES =====

  removeRows(position: number, count: number): TrackEntry[] {
    const size = this.store.size;
    const inRange = Number.isInteger(position) && Number.isInteger(count) && position >= 0 && count >= 0;
    if (!inRange || position + count > size) {
      throw PlaylistError.outOfRange('Remove', position, count, size);
    }
    if (count === 0) return [];
    return this.log.execute(new RemoveItemsCommand(this.internals(), [{ position, count }])).removedEntries;
  }

  /** Removes any set of rows as one undo step */
  removeRowSet(rows: readonly number[]): TrackEntry[] {
    if (rows.length === 0) return [];
    return this.log.execute(new RemoveItemsCommand(this.internals(), toRanges(rows))).removedEntries;
  }

  removeRowsWithoutUndo(rows: readonly number[]): TrackEntry[] {
    const removed: TrackEntry[] = [];
    for (const range of toRanges(rows).reverse()) {
      removed.unshift(...this.store.remove(range.position, range.count));
    }
    if (removed.length > 0) this.log.clear();
    return removed;
  }

  /** Keeps only queued rows and the current row; bypasses undo */
  removeUnqueuedRows(): number {
    const current = this.store.currentRow;
    const doomed: number[] = [];
    for (let row = 0; row < this.store.size; row++) {
      if (row !== current && !this.queue.contains(row)) doomed.push(row);
    }
    return this.removeRowsWithoutUndo(doomed).length;
  }

  removeInvalidRows(): TrackEntry[] {
    const invalid = this.store
      .entries()
      .map((entry, row) => (entry.valid ? -1 : row))
      .filter(row => row >= 0);
    return this.removeRowSet(invalid);
  }

  /** An identity move records no undo step */
  moveRows(sources: readonly number[], destination: number): number {
    const size = this.store.size;
    const rows = [...new Set(sources)].sort((a, b) => a - b);
    for (const row of rows) {
      if (!Number.isInteger(row) || row < 0 || row >= size) {
        throw PlaylistError.outOfRange('Move', row, rows.length, size);
      }
    }
    const start = Math.min(Math.max(0, Math.floor(destination)), size - rows.length);
    if (rows.every((row, k) => row === start + k)) return start;

    const command = this.log.execute(new MoveItemsCommand(this.internals(), sources, destination));
    return command.movedTo ?? destination;
  }

  /** Undoable removal of every row; also ends dynamic mode and abandons pending async work */
  clear(): void {
    this.epoch++;
    this.dynamic.turnOff();
    const size = this.store.size;
    if (size === 0) return;

    if (size > this.config.undoItemLimit) {
      this.store.remove(0, size);
      this.log.clear();
    } else {
      this.log.execute(new RemoveItemsCommand(this.internals(), [{ position: 0, count: size }]));
    }
    logger.debug('Playlist cleared', { playlistId: this.id, removed: size });
  }

  // ===== UNDO =====

  undo(): string | null {
    return this.log.undo()?.description ?? null;
  }

  redo(): string | null {
    return this.log.redo()?.description ?? null;
  }

  // ===== ORDERING =====

  sort(key: SortKey, direction: SortDirection = 'asc'): void {
    const compare = SORTERS[key];
    const sign = direction === 'asc' ? 1 : -1;
    const sorted = [...this.internals().items()].sort(
      (a, b) => sign * compare(a.entry.effectiveMetadata, b.entry.effectiveMetadata)
    );
    this.log.execute(new ReorderItemsCommand(this.internals(), sorted, 'Sort playlist'));
  }

  /**
   * Shuffles the display order. The current row moves to the top; in a
   * dynamic playlist only the unplayed future is shuffled.
   */
  shuffle(): void {
    const items = [...this.internals().items()];
    const current = this.store.currentRow;
    let fixed: StoredItem[] = [];
    let rest = items;

    if (current !== null) {
      if (this.dynamic.isActive) {
        fixed = items.slice(0, current + 1);
        rest = items.slice(current + 1);
      } else {
        fixed = items.slice(current, current + 1);
        rest = items.filter((_, row) => row !== current);
      }
    }

    const order = [...fixed, ...fisherYates(rest, this.random)];
    this.log.execute(new ReorderItemsCommand(this.internals(), order, 'Shuffle playlist'));
  }

  setShuffleMode(mode: ShuffleMode): void {
    if (mode !== 'off' && this.dynamic.isActive) {
      throw PlaylistError.invalidRequest('shuffle is unavailable while the playlist is dynamic');
    }
    this.order.setShuffleMode(mode);
  }

  setRepeatMode(mode: RepeatMode): void {
    this.order.setRepeatMode(mode);
  }

  setDisplayFilter(filter: DisplayFilter | null): void {
    this.displayFilter = filter;
  }

  /**
   * Row that plays next: none after the stop-after row, otherwise the head
   * of the queue, otherwise the play order.
   */
  nextRow(): number | null {
    const current = this.store.currentRow;
    if (current !== null && current === this.store.stopAfterRow) return null;
    const queued = this.queue.peekNext();
    if (queued !== null) return queued;
    return this.order.nextRow(current, this.displayFilter ?? undefined);
  }

  previousRow(): number | null {
    return this.order.previousRow(this.store.currentRow, this.displayFilter ?? undefined);
  }

  advance(): number | null {
    const next = this.nextRow();
    if (next !== null) this.setCurrentRow(next);
    return next;
  }

  goBack(): number | null {
    const previous = this.previousRow();
    if (previous !== null) this.setCurrentRow(previous);
    return previous;
  }

  // ===== POINTERS & PLAYBACK STATE =====

  setCurrentRow(row: number | null): void {
    const previous = this.store.currentRow;
    if (row !== null) this.store.entryAt(row);

    if (previous !== null && previous !== row) {
      this.store.setLastPlayedRow(previous);
    }
    if (row !== null && row === this.queue.peekNext()) {
      this.queue.dequeue();
    }

    this.store.setCurrentRow(row);
    this.updateScrobblePoint();

    if (row !== null && (previous === null || row > previous) && this.dynamic.isActive) {
      this.dynamic.onCurrentAdvanced().catch(error => {
        logger.error('Dynamic playlist update failed', { playlistId: this.id, error: serializeError(error) });
      });
    }
  }

  /** Marks `row` as the last one to play; marking it again clears the mark */
  toggleStopAfter(row: number): void {
    this.store.entryAt(row);
    this.store.setStopAfterRow(this.store.stopAfterRow === row ? null : row);
    this.notifier.emit('dataChanged', { first: row, last: row });
  }

  playing(): void {
    this.setPlaybackState('playing');
  }

  paused(): void {
    this.setPlaybackState('paused');
  }

  stopped(): void {
    this.setPlaybackState('stopped');
  }

  // ===== ENTRY UPDATES =====

  setStreamMetadata(url: string, metadata: StreamMetadata): boolean {
    const row = this.store.currentRow;
    if (row === null || this.store.entryAt(row).metadata.url !== url) return false;
    this.store.updateEntry(row, entry => entry.withStreamMetadata(metadata));
    this.updateScrobblePoint();
    return true;
  }

  clearStreamMetadata(): void {
    const row = this.store.currentRow;
    if (row === null) return;
    this.store.updateEntry(row, entry => entry.withoutStreamMetadata());
    this.updateScrobblePoint();
  }

  /** Returns whether the current entry matched `url` */
  applyValidityOnCurrentSong(url: string, valid: boolean): boolean {
    const row = this.store.currentRow;
    if (row === null || this.store.entryAt(row).metadata.url !== url) return false;
    this.store.updateEntry(row, entry => entry.withValidity(valid));
    return true;
  }

  /** Marks entries for which `isMissing` holds invalid and the others valid; returns how many changed */
  invalidateDeletedTracks(isMissing: (entry: TrackEntry) => boolean): number {
    let changed = 0;
    for (let row = 0; row < this.store.size; row++) {
      const entry = this.store.entryAt(row);
      if (entry.isStream) continue;
      const valid = !isMissing(entry);
      if (valid !== entry.valid) {
        this.store.updateEntry(row, current => current.withValidity(valid));
        changed++;
      }
    }
    return changed;
  }

  async rateTrack(row: number, rating: number): Promise<void> {
    if (!Number.isFinite(rating) || rating < 0 || rating > 1) {
      throw PlaylistError.validationError('rating', 'must be between 0 and 1');
    }
    const ref = this.store.refAt(row);
    const updated = this.store.updateEntry(row, entry => entry.withMetadata({ rating }));

    const provider = this.deps.libraryProvider;
    if (!updated.libraryId || !provider?.saveRating) return;
    try {
      await provider.saveRating(updated.libraryId, rating);
    } catch (error) {
      logger.warn('Failed to save rating', { playlistId: this.id, row: this.store.indexOf(ref), error: serializeError(error) });
      throw PlaylistError.persistenceFailed('save rating', error instanceof Error ? error : undefined);
    }
  }

  /** Re-reads library entries at `rows`; rows removed meanwhile are skipped */
  async reloadItems(rows: readonly number[]): Promise<number> {
    const provider = this.deps.libraryProvider;
    if (!provider) return 0;

    const targets = rows.map(row => ({ ref: this.store.refAt(row), libraryId: this.store.entryAt(row).libraryId }));
    const ids = [...new Set(targets.flatMap(target => (target.libraryId ? [target.libraryId] : [])))];
    if (ids.length === 0) return 0;

    const epoch = this.epoch;
    const records = await provider.findByIds(ids);
    if (epoch !== this.epoch) {
      logger.debug('Dropping stale reload', { playlistId: this.id });
      return 0;
    }

    const byId = new Map(records.map(record => [record.libraryId, record]));
    let reloaded = 0;
    for (const target of targets) {
      const row = this.store.indexOf(target.ref);
      const record = target.libraryId ? byId.get(target.libraryId) : undefined;
      if (row === null || !record) continue;
      this.store.updateEntry(row, entry => entry.withMetadata(record.metadata).withValidity(record.valid));
      reloaded++;
    }
    this.updateScrobblePoint();
    return reloaded;
  }

  /** Refreshes every row that references one of the changed library records */
  onLibraryRecordsChanged(records: readonly TrackEntry[]): number {
    let updated = 0;
    for (const record of records) {
      if (!record.libraryId) continue;
      for (const row of this.store.rowsForLibraryId(record.libraryId)) {
        this.store.updateEntry(row, entry => entry.withMetadata(record.metadata).withValidity(record.valid));
        updated++;
      }
    }
    if (updated > 0) this.updateScrobblePoint();
    return updated;
  }

  // ===== DYNAMIC =====

  turnOffDynamic(): void {
    this.dynamic.turnOff();
  }

  repopulateDynamic(): Promise<void> {
    return this.dynamic.repopulate();
  }

  // ===== PERSISTENCE =====

  snapshot(): PlaylistSnapshot {
    return {
      name: this._name,
      entries: this.store.entries().map(toPersistedEntry),
      currentRow: this.store.currentRow,
      lastPlayedRow: this.store.lastPlayedRow,
      stopAfterRow: this.store.stopAfterRow,
      repeatMode: this.order.repeatMode,
      shuffleMode: this.order.shuffleMode,
      dynamic: this.dynamic.reference,
    };
  }

  /**
   * Replaces the contents with a persisted snapshot. Library entries are
   * resolved through the library provider; records that no longer exist
   * come back as invalid placeholders.
   */
  async restore(snapshot: PlaylistSnapshot): Promise<boolean> {
    const epoch = ++this.epoch;
    this.dynamic.turnOff();

    const libraryIds = [
      ...new Set(snapshot.entries.flatMap(entry => (entry.kind === 'library' ? [entry.libraryId] : []))),
    ];
    const provider = this.deps.libraryProvider;
    const records = libraryIds.length > 0 && provider ? await provider.findByIds(libraryIds) : [];
    if (epoch !== this.epoch) {
      logger.debug('Dropping stale restore', { playlistId: this.id });
      return false;
    }

    const byId = new Map(records.map(record => [record.libraryId, record]));
    const entries = snapshot.entries.map(persisted => fromPersistedEntry(persisted, byId));

    if (this.store.size > 0) this.store.remove(0, this.store.size);
    this.store.insert(0, entries);
    this.log.clear();
    this.notifier.emit('structureChanged', { type: 'reset' });

    this._name = snapshot.name;
    this.order.setRepeatMode(snapshot.repeatMode);
    this.order.setShuffleMode(snapshot.shuffleMode);
    this.store.setCurrentRow(this.validRow(snapshot.currentRow));
    this.store.setLastPlayedRow(this.validRow(snapshot.lastPlayedRow));
    this.store.setStopAfterRow(this.validRow(snapshot.stopAfterRow));
    this.updateScrobblePoint();

    if (snapshot.dynamic) {
      const generator = this.deps.generatorFactory?.(snapshot.dynamic) ?? null;
      if (generator) {
        this.dynamic.resume(generator);
      } else {
        logger.warn('No generator available for restored dynamic playlist', {
          playlistId: this.id,
          generator: snapshot.dynamic.type,
        });
      }
    }

    logger.info('Playlist restored', { playlistId: this.id, items: entries.length });
    this.notifier.emit('restoreFinished', { itemCount: entries.length });
    return true;
  }

  /** Abandons pending async work and detaches all subscribers */
  dispose(): void {
    this.epoch++;
    this.dynamic.turnOff();
    this.notifier.removeAll();
  }

  // ===== PRIVATE =====

  private internals(): ItemStoreInternals {
    return this.store[ITEM_STORE_INTERNALS]();
  }

  private validRow(row: number | null): number | null {
    return row !== null && row >= 0 && row < this.store.size ? row : null;
  }

  private setPlaybackState(state: PlaybackState): void {
    this._playbackState = state;
    const row = this.store.currentRow;
    if (row !== null) this.notifier.emit('dataChanged', { first: row, last: row });
  }

  private updateScrobblePoint(): void {
    const entry = this.currentEntry;
    this._hasScrobbled = false;
    if (!entry) {
      this._scrobblePoint = null;
      return;
    }
    const length = entry.effectiveMetadata.durationSeconds;
    this._scrobblePoint =
      length <= 0
        ? MAX_SCROBBLE_POINT_SECONDS
        : Math.min(MAX_SCROBBLE_POINT_SECONDS, Math.max(MIN_SCROBBLE_POINT_SECONDS, Math.floor(length / 2)));
  }
}

function toPersistedEntry(entry: TrackEntry): PersistedEntry {
  if (entry.kind === 'library' && entry.libraryId) {
    return { kind: 'library', libraryId: entry.libraryId };
  }
  return { kind: entry.kind === 'radio' ? 'radio' : 'url', metadata: { ...entry.metadata } };
}

function fromPersistedEntry(persisted: PersistedEntry, library: Map<string | undefined, TrackEntry>): TrackEntry {
  if (persisted.kind !== 'library') {
    return TrackEntry.create({ kind: persisted.kind, metadata: persisted.metadata });
  }
  const record = library.get(persisted.libraryId);
  if (record) return record.duplicate();
  return TrackEntry.create({
    kind: 'library',
    libraryId: persisted.libraryId,
    metadata: { title: persisted.libraryId },
    valid: false,
  });
}
