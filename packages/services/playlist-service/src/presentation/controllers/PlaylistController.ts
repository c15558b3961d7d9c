import type { Request, Response } from 'express';
import { createResponseHelpers } from '@tracklane/platform-core';
import { PlaylistError } from '../../application/errors';
import type { PlaylistManager } from '../../application/services';
import { getLogger } from '../../config/service-config';
import { TrackEntry, type InsertOptions, type InsertResult, type Playlist } from '../../domains/playlist';
import type {
  CreatePlaylistBody,
  InsertEntriesBody,
  InsertLibraryBody,
  InsertRadioBody,
  InsertUrlsBody,
  MoveRowsBody,
  RateBody,
  RemoveRowsBody,
  RenameBody,
  SetCurrentBody,
  SetModesBody,
  SortBody,
  StopAfterBody,
} from '../middleware/validation';

const { sendSuccess, sendCreated, sendNoContent } = createResponseHelpers();
const logger = getLogger('playlist-service-controller');

export interface EntryView {
  id: string;
  kind: TrackEntry['kind'];
  libraryId: string | null;
  valid: boolean;
  origin: TrackEntry['origin'];
  title: string;
  artist: string;
  album: string;
  durationSeconds: number;
  url: string | null;
}

export function toEntryView(entry: TrackEntry): EntryView {
  const metadata = entry.effectiveMetadata;
  return {
    id: entry.id,
    kind: entry.kind,
    libraryId: entry.libraryId ?? null,
    valid: entry.valid,
    origin: entry.origin,
    title: metadata.title,
    artist: metadata.artist,
    album: metadata.album,
    durationSeconds: metadata.durationSeconds,
    url: metadata.url ?? null,
  };
}

export function toPlaylistView(playlist: Playlist) {
  return {
    id: playlist.id,
    name: playlist.name,
    size: playlist.size,
    currentRow: playlist.currentRow,
    lastPlayedRow: playlist.lastPlayedRow,
    stopAfterRow: playlist.stopAfterRow,
    shuffleMode: playlist.shuffleMode,
    repeatMode: playlist.repeatMode,
    dynamic: playlist.isDynamic,
    totalLengthSeconds: playlist.totalLengthSeconds,
    history: playlist.history,
    entries: playlist.entries().map(toEntryView),
  };
}

function toInsertView(result: InsertResult | null) {
  if (!result) return null;
  return { start: result.start, count: result.count, rejected: result.rejected.map(toEntryView) };
}

function insertOptions(body: Pick<InsertUrlsBody, 'position' | 'playNow' | 'enqueue'>): InsertOptions {
  return { position: body.position, playNow: body.playNow, enqueue: body.enqueue };
}

export class PlaylistController {
  constructor(private readonly manager: PlaylistManager) {}

  async create(req: Request, res: Response): Promise<void> {
    const body: CreatePlaylistBody = req.body;
    const playlist = this.manager.create(body.name, body.id);
    sendCreated(res, toPlaylistView(playlist));
  }

  async list(_req: Request, res: Response): Promise<void> {
    const stored = await this.manager.listStored();
    sendSuccess(res, { open: this.manager.listOpen(), stored });
  }

  async get(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    sendSuccess(res, toPlaylistView(playlist));
  }

  async rename(req: Request, res: Response): Promise<void> {
    const body: RenameBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    playlist.rename(body.name);
    sendSuccess(res, toPlaylistView(playlist));
  }

  async remove(req: Request, res: Response): Promise<void> {
    await this.manager.remove(req.params.id, { deleteStored: req.query.deleteStored === 'true' });
    sendNoContent(res);
  }

  // ===== INSERTION =====

  async insertEntries(req: Request, res: Response): Promise<void> {
    const body: InsertEntriesBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    const entries = body.entries.map(entry => TrackEntry.create({ kind: entry.kind, metadata: entry.metadata }));
    const result = playlist.insertEntries(entries, insertOptions(body));
    sendSuccess(res, { playlist: toPlaylistView(playlist), inserted: toInsertView(result) });
  }

  async insertLibraryItems(req: Request, res: Response): Promise<void> {
    const body: InsertLibraryBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    const result = await playlist.insertLibraryItems(body.libraryIds, insertOptions(body));
    sendSuccess(res, { playlist: toPlaylistView(playlist), inserted: toInsertView(result) });
  }

  async insertUrls(req: Request, res: Response): Promise<void> {
    const body: InsertUrlsBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    const result = await playlist.insertUrls(body.urls, insertOptions(body));
    sendSuccess(res, { playlist: toPlaylistView(playlist), inserted: toInsertView(result) });
  }

  async insertRadioStations(req: Request, res: Response): Promise<void> {
    const body: InsertRadioBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    const result = playlist.insertRadioStations(body.stations, insertOptions(body));
    sendSuccess(res, { playlist: toPlaylistView(playlist), inserted: toInsertView(result) });
  }

  // ===== MUTATION =====

  async removeRows(req: Request, res: Response): Promise<void> {
    const body: RemoveRowsBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    const removed = playlist.removeRowSet(body.rows);
    sendSuccess(res, { playlist: toPlaylistView(playlist), removed: removed.map(toEntryView) });
  }

  async moveRows(req: Request, res: Response): Promise<void> {
    const body: MoveRowsBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    const movedTo = playlist.moveRows(body.rows, body.destination);
    sendSuccess(res, { playlist: toPlaylistView(playlist), movedTo });
  }

  async clear(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    playlist.clear();
    sendSuccess(res, toPlaylistView(playlist));
  }

  async removeInvalid(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    const removed = playlist.removeInvalidRows();
    sendSuccess(res, { playlist: toPlaylistView(playlist), removed: removed.map(toEntryView) });
  }

  async removeUnqueued(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    const removed = playlist.removeUnqueuedRows();
    sendSuccess(res, { playlist: toPlaylistView(playlist), removed });
  }

  async undo(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    const undone = playlist.undo();
    if (undone === null) throw PlaylistError.nothingToUndo();
    sendSuccess(res, { playlist: toPlaylistView(playlist), undone });
  }

  async redo(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    const redone = playlist.redo();
    if (redone === null) throw PlaylistError.nothingToRedo();
    sendSuccess(res, { playlist: toPlaylistView(playlist), redone });
  }

  // ===== ORDERING & PLAYBACK =====

  async sort(req: Request, res: Response): Promise<void> {
    const body: SortBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    playlist.sort(body.key, body.direction);
    sendSuccess(res, toPlaylistView(playlist));
  }

  async shuffle(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    playlist.shuffle();
    sendSuccess(res, toPlaylistView(playlist));
  }

  async setModes(req: Request, res: Response): Promise<void> {
    const body: SetModesBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    if (body.shuffle !== undefined) playlist.setShuffleMode(body.shuffle);
    if (body.repeat !== undefined) playlist.setRepeatMode(body.repeat);
    sendSuccess(res, { shuffleMode: playlist.shuffleMode, repeatMode: playlist.repeatMode });
  }

  async setCurrent(req: Request, res: Response): Promise<void> {
    const body: SetCurrentBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    playlist.setCurrentRow(body.row);
    sendSuccess(res, this.pointers(playlist));
  }

  async next(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    const row = playlist.advance();
    sendSuccess(res, { row, ...this.pointers(playlist) });
  }

  async previous(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    const row = playlist.goBack();
    sendSuccess(res, { row, ...this.pointers(playlist) });
  }

  async toggleStopAfter(req: Request, res: Response): Promise<void> {
    const body: StopAfterBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    playlist.toggleStopAfter(body.row);
    sendSuccess(res, this.pointers(playlist));
  }

  async rate(req: Request, res: Response): Promise<void> {
    const body: RateBody = req.body;
    const playlist = await this.manager.open(req.params.id);
    await playlist.rateTrack(body.row, body.rating);
    sendSuccess(res, toEntryView(playlist.entryAt(body.row)));
  }

  // ===== PERSISTENCE & DYNAMIC =====

  async save(req: Request, res: Response): Promise<void> {
    await this.manager.save(req.params.id);
    sendSuccess(res, { id: req.params.id, saved: true });
  }

  async restore(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.restore(req.params.id);
    sendSuccess(res, toPlaylistView(playlist));
  }

  async turnOffDynamic(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    playlist.turnOffDynamic();
    sendSuccess(res, toPlaylistView(playlist));
  }

  async repopulateDynamic(req: Request, res: Response): Promise<void> {
    const playlist = await this.manager.open(req.params.id);
    if (!playlist.isDynamic) {
      throw PlaylistError.invalidRequest('playlist is not dynamic');
    }
    await playlist.repopulateDynamic();
    logger.debug('Dynamic playlist repopulated', { playlistId: playlist.id, size: playlist.size });
    sendSuccess(res, toPlaylistView(playlist));
  }

  private pointers(playlist: Playlist) {
    return {
      currentRow: playlist.currentRow,
      lastPlayedRow: playlist.lastPlayedRow,
      stopAfterRow: playlist.stopAfterRow,
      scrobblePointSeconds: playlist.scrobblePointSeconds,
    };
  }
}
