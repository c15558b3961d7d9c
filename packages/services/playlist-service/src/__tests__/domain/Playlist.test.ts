import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Playlist } from '../../domains/playlist/entities/Playlist';
import type { ILibraryProvider, PlaylistSnapshot } from '../../domains/playlist/ports';
import { TrackEntry } from '../../domains/playlist/value-objects';
import { ScriptedGenerator, libraryTrack, testConfig, titles, track, zeroRandom } from '../fixtures';

describe('Playlist', () => {
  let playlist: Playlist;

  beforeEach(() => {
    playlist = new Playlist('p-1', 'Mix', { config: testConfig, random: zeroRandom });
  });

  const seed = (...names: string[]) => playlist.insertEntries(names.map(name => track(name)), { undoable: false });

  describe('removal and moves', () => {
    it('should remove a set of rows as one undo step', () => {
      seed('A', 'B', 'C', 'D');

      const removed = playlist.removeRowSet([2, 0]);

      expect(titles(removed)).toEqual(['A', 'C']);
      expect(titles(playlist.entries())).toEqual(['B', 'D']);
      expect(playlist.undo()).toBe('Remove 2 tracks');
      expect(titles(playlist.entries())).toEqual(['A', 'B', 'C', 'D']);
    });

    it('should move rows and renumber the queue', () => {
      seed('A', 'B', 'C');
      playlist.queue.enqueue([0]);

      expect(playlist.moveRows([0, 2], 1)).toBe(1);
      expect(titles(playlist.entries())).toEqual(['B', 'A', 'C']);
      expect(playlist.queue.rows()).toEqual([1]);
    });

    it('should record no step for an empty removal', () => {
      seed('A', 'B');
      playlist.removeRows(0, 1);
      playlist.undo();

      expect(playlist.removeRows(0, 0)).toEqual([]);
      expect(playlist.history.canRedo).toBe(true);
      expect(playlist.history.redoText).toBe('Remove 1 track');
      expect(() => playlist.removeRows(1, 2)).toThrow();
    });

    it('should record no step for a move that changes nothing', () => {
      seed('A', 'B', 'C');
      playlist.removeRows(0, 1);
      playlist.undo();

      expect(playlist.moveRows([1], 1)).toBe(1);
      expect(playlist.moveRows([2], 5)).toBe(2);
      expect(titles(playlist.entries())).toEqual(['A', 'B', 'C']);
      expect(playlist.history.canRedo).toBe(true);
      expect(playlist.history.undoText).toBeNull();
    });

    it('should keep only queued rows and the current row', () => {
      seed('A', 'B', 'C', 'D');
      playlist.setCurrentRow(0);
      playlist.queue.enqueue([2]);

      expect(playlist.removeUnqueuedRows()).toBe(2);
      expect(titles(playlist.entries())).toEqual(['A', 'C']);
      expect(playlist.queue.rows()).toEqual([1]);
      expect(playlist.history.canUndo).toBe(false);
    });

    it('should clear as an undoable step', () => {
      seed('A', 'B');
      playlist.clear();

      expect(playlist.size).toBe(0);
      expect(playlist.undo()).toBe('Remove 2 tracks');
      expect(titles(playlist.entries())).toEqual(['A', 'B']);
    });

    it('should clear large playlists without an undo step', () => {
      playlist = new Playlist('p-1', 'Mix', { config: { ...testConfig, undoItemLimit: 2 } });
      seed('A', 'B', 'C');
      playlist.clear();

      expect(playlist.size).toBe(0);
      expect(playlist.history.canUndo).toBe(false);
    });
  });

  describe('undo after in-place updates', () => {
    it('should keep a rating given after a sort when the sort is undone', async () => {
      seed('B', 'A');
      playlist.sort('title');
      await playlist.rateTrack(0, 0.8);

      playlist.undo();

      expect(titles(playlist.entries())).toEqual(['B', 'A']);
      expect(playlist.entryAt(1).metadata.rating).toBe(0.8);
      playlist.redo();
      expect(playlist.entryAt(0).metadata.rating).toBe(0.8);
    });

    it('should bring back the updated entry when an insert is redone', () => {
      playlist.insertEntries([track('A')]);
      playlist.setCurrentRow(0);
      playlist.applyValidityOnCurrentSong('http://media.test/A.mp3', false);

      playlist.undo();
      expect(playlist.size).toBe(0);
      playlist.redo();

      expect(playlist.entryAt(0).valid).toBe(false);
    });

    it('should bring back the updated entry when a move is undone', () => {
      seed('A', 'B');
      playlist.moveRows([0], 1);
      playlist.setCurrentRow(1);
      playlist.applyValidityOnCurrentSong('http://media.test/A.mp3', false);

      playlist.undo();

      expect(titles(playlist.entries())).toEqual(['A', 'B']);
      expect(playlist.entryAt(0).valid).toBe(false);
    });
  });

  describe('ordering', () => {
    it('should sort stably and undo the sort', () => {
      playlist.insertEntries([track('b', { artist: 'Zed' }), track('A'), track('c')], { undoable: false });

      playlist.sort('title');
      expect(titles(playlist.entries())).toEqual(['A', 'b', 'c']);

      playlist.sort('title', 'desc');
      expect(titles(playlist.entries())).toEqual(['c', 'b', 'A']);

      playlist.undo();
      playlist.undo();
      playlist.sort('artist');
      expect(titles(playlist.entries())).toEqual(['A', 'c', 'b']);
      expect(playlist.history.undoText).toBe('Sort playlist');
    });

    it('should sort albums by disc and track number', () => {
      playlist.insertEntries(
        [
          track('Two', { album: 'X', disc: 1, trackNumber: 2 }),
          track('Three', { album: 'X', disc: 2, trackNumber: 1 }),
          track('One', { album: 'X', disc: 1, trackNumber: 1 }),
        ],
        { undoable: false }
      );

      playlist.sort('album');

      expect(titles(playlist.entries())).toEqual(['One', 'Two', 'Three']);
    });

    it('should shuffle with the current row on top', () => {
      seed('A', 'B', 'C', 'D');
      playlist.setCurrentRow(2);

      playlist.shuffle();
      expect(titles(playlist.entries())).toEqual(['C', 'B', 'D', 'A']);
      expect(playlist.currentRow).toBe(0);

      expect(playlist.undo()).toBe('Shuffle playlist');
      expect(titles(playlist.entries())).toEqual(['A', 'B', 'C', 'D']);
      expect(playlist.currentRow).toBe(2);
    });
  });

  describe('traversal', () => {
    it('should advance and go back, tracking the last played row', () => {
      seed('A', 'B', 'C');

      expect(playlist.advance()).toBe(0);
      expect(playlist.advance()).toBe(1);
      expect(playlist.lastPlayedRow).toBe(0);

      expect(playlist.goBack()).toBe(0);
      expect(playlist.lastPlayedRow).toBe(1);
    });

    it('should play queued rows first and dequeue them', () => {
      seed('A', 'B', 'C');
      playlist.setCurrentRow(0);
      playlist.queue.enqueue([2]);

      expect(playlist.advance()).toBe(2);
      expect(playlist.queue.isEmpty()).toBe(true);
      expect(playlist.nextRow()).toBeNull();
    });

    it('should stop after the marked row', () => {
      seed('A', 'B', 'C');
      playlist.setCurrentRow(1);

      playlist.toggleStopAfter(1);
      expect(playlist.stopAfterRow).toBe(1);
      expect(playlist.nextRow()).toBeNull();

      playlist.toggleStopAfter(1);
      expect(playlist.stopAfterRow).toBeNull();
      expect(playlist.nextRow()).toBe(2);
    });

    it('should apply the display filter', () => {
      seed('A', 'B', 'C');
      playlist.setCurrentRow(0);
      playlist.setDisplayFilter(row => playlist.entryAt(row).metadata.title !== 'B');

      expect(playlist.nextRow()).toBe(2);
    });

    it('should reject a current row outside the playlist', () => {
      seed('A');
      expect(() => playlist.setCurrentRow(3)).toThrowError('Row lookup out of range: position 3, count 1, size 1');
    });
  });

  describe('scrobble point', () => {
    it('should sit at half the length between 31 and 240 seconds', () => {
      playlist.insertEntries(
        [
          track('Unknown', { durationSeconds: 0 }),
          track('Short', { durationSeconds: 50 }),
          track('Normal', { durationSeconds: 300 }),
          track('Long', { durationSeconds: 1000 }),
        ],
        { undoable: false }
      );

      const points = [0, 1, 2, 3].map(row => {
        playlist.setCurrentRow(row);
        return playlist.scrobblePointSeconds;
      });

      expect(points).toEqual([240, 31, 150, 240]);
    });

    it('should reset the scrobbled flag when the current row changes', () => {
      seed('A', 'B');
      playlist.setCurrentRow(0);
      playlist.hasScrobbled = true;

      playlist.setCurrentRow(1);

      expect(playlist.hasScrobbled).toBe(false);
    });
  });

  describe('entry updates', () => {
    it('should layer stream metadata over the current radio entry', () => {
      playlist.insertRadioStations([{ name: 'Station', url: 'http://radio.test/live' }]);
      playlist.setCurrentRow(0);

      expect(playlist.setStreamMetadata('http://radio.test/other', { title: 'Nope' })).toBe(false);
      expect(playlist.setStreamMetadata('http://radio.test/live', { title: 'Live Song', durationSeconds: 200 })).toBe(true);
      expect(playlist.entryAt(0).effectiveMetadata.title).toBe('Live Song');
      expect(playlist.entryAt(0).metadata.title).toBe('Station');
      expect(playlist.scrobblePointSeconds).toBe(100);

      playlist.clearStreamMetadata();
      expect(playlist.entryAt(0).effectiveMetadata.title).toBe('Station');
      expect(playlist.scrobblePointSeconds).toBe(240);
    });

    it('should mark the current song invalid and remove invalid rows', () => {
      seed('A', 'B');
      playlist.setCurrentRow(1);

      expect(playlist.applyValidityOnCurrentSong('http://media.test/A.mp3', false)).toBe(false);
      expect(playlist.applyValidityOnCurrentSong('http://media.test/B.mp3', false)).toBe(true);

      expect(titles(playlist.removeInvalidRows())).toEqual(['B']);
      expect(titles(playlist.entries())).toEqual(['A']);
    });

    it('should mark deleted library tracks and skip streams', () => {
      playlist.insertEntries([libraryTrack('lib-1'), libraryTrack('lib-2')]);
      playlist.insertRadioStations([{ name: 'Station', url: 'http://radio.test/live' }]);
      const isMissing = vi.fn((entry: TrackEntry) => entry.libraryId === 'lib-2');

      expect(playlist.invalidateDeletedTracks(isMissing)).toBe(1);
      expect(playlist.entryAt(1).valid).toBe(false);
      expect(isMissing).toHaveBeenCalledTimes(2);
      expect(playlist.invalidateDeletedTracks(isMissing)).toBe(0);
    });

    it('should refresh every row holding a changed library record', () => {
      playlist.insertEntries([libraryTrack('lib-1'), track('A'), libraryTrack('lib-1')]);

      const updated = playlist.onLibraryRecordsChanged([libraryTrack('lib-1', { title: 'Renamed' })]);

      expect(updated).toBe(2);
      expect(titles(playlist.entries())).toEqual(['Renamed', 'A', 'Renamed']);
    });
  });

  describe('library collaboration', () => {
    let library: { findByIds: ReturnType<typeof vi.fn>; saveRating: ReturnType<typeof vi.fn> };

    beforeEach(() => {
      library = {
        findByIds: vi.fn().mockResolvedValue([libraryTrack('lib-1', { title: 'Reloaded', durationSeconds: 90 })]),
        saveRating: vi.fn().mockResolvedValue(undefined),
      };
      playlist = new Playlist('p-1', 'Mix', { config: testConfig, libraryProvider: library });
      playlist.insertEntries([libraryTrack('lib-1'), track('A')]);
    });

    it('should rate a track and save the rating', async () => {
      await playlist.rateTrack(0, 0.8);

      expect(playlist.entryAt(0).metadata.rating).toBe(0.8);
      expect(library.saveRating).toHaveBeenCalledWith('lib-1', 0.8);
    });

    it('should reject ratings outside 0..1', async () => {
      await expect(playlist.rateTrack(0, 1.5)).rejects.toThrowError('Validation failed for rating: must be between 0 and 1');
    });

    it('should report a failed rating save', async () => {
      library.saveRating.mockRejectedValue(new Error('read only'));

      await expect(playlist.rateTrack(0, 0.5)).rejects.toMatchObject({
        message: 'Failed to save rating',
        code: 'PERSISTENCE_FAILED',
      });
    });

    it('should reload library rows in place', async () => {
      expect(await playlist.reloadItems([0, 1])).toBe(1);
      expect(library.findByIds).toHaveBeenCalledWith(['lib-1']);
      expect(playlist.entryAt(0).metadata).toMatchObject({ title: 'Reloaded', durationSeconds: 90 });
    });
  });

  describe('persistence', () => {
    const buildSnapshot = (): PlaylistSnapshot => {
      const source = new Playlist('p-1', 'Evening', { config: testConfig });
      source.insertEntries([libraryTrack('lib-1', { title: 'One' })]);
      source.insertRadioStations([{ name: 'Station', url: 'http://radio.test/live' }]);
      source.insertEntries([track('A')]);
      source.setCurrentRow(0);
      source.setCurrentRow(1);
      source.toggleStopAfter(2);
      source.setRepeatMode('playlist');
      source.setShuffleMode('by-album');
      return source.snapshot();
    };

    it('should describe entries by library id or inline metadata', () => {
      const snapshot = buildSnapshot();

      expect(snapshot).toMatchObject({
        name: 'Evening',
        currentRow: 1,
        lastPlayedRow: 0,
        stopAfterRow: 2,
        repeatMode: 'playlist',
        shuffleMode: 'by-album',
        dynamic: null,
      });
      expect(snapshot.entries[0]).toEqual({ kind: 'library', libraryId: 'lib-1' });
      expect(snapshot.entries[1]).toEqual({
        kind: 'radio',
        metadata: { title: 'Station', url: 'http://radio.test/live', artist: '', album: '', durationSeconds: 0 },
      });
      expect(snapshot.entries[2]).toMatchObject({ kind: 'url', metadata: { title: 'A' } });
    });

    it('should restore entries, pointers and modes', async () => {
      const library: ILibraryProvider = {
        findByIds: vi.fn().mockResolvedValue([libraryTrack('lib-1', { title: 'One' })]),
      };
      const restored = new Playlist('p-1', 'Empty', { config: testConfig, libraryProvider: library });
      restored.insertEntries([track('Old')]);
      const finished = vi.fn();
      restored.on('restoreFinished', finished);

      expect(await restored.restore(buildSnapshot())).toBe(true);

      expect(restored.name).toBe('Evening');
      expect(titles(restored.entries())).toEqual(['One', 'Station', 'A']);
      expect(restored.currentRow).toBe(1);
      expect(restored.lastPlayedRow).toBe(0);
      expect(restored.stopAfterRow).toBe(2);
      expect(restored.repeatMode).toBe('playlist');
      expect(restored.shuffleMode).toBe('by-album');
      expect(restored.history.canUndo).toBe(false);
      expect(finished).toHaveBeenCalledWith({ itemCount: 3 });
    });

    it('should restore missing library records as invalid placeholders', async () => {
      const snapshot = buildSnapshot();

      await playlist.restore({ ...snapshot, currentRow: 7 });

      expect(playlist.entryAt(0).valid).toBe(false);
      expect(playlist.entryAt(0).metadata.title).toBe('lib-1');
      expect(playlist.currentRow).toBeNull();
    });

    it('should resume a dynamic generator without generating', async () => {
      const generator = new ScriptedGenerator(true, 1);
      const withFactory = new Playlist('p-1', 'Radio', { config: testConfig, generatorFactory: () => generator });

      await withFactory.restore({ ...buildSnapshot(), shuffleMode: 'off', dynamic: generator.reference });

      expect(withFactory.isDynamic).toBe(true);
      expect(generator.calls).toEqual([]);
      expect(withFactory.snapshot().dynamic).toEqual({ type: 'scripted', config: {} });
    });

    it('should abandon a restore overtaken by a clear', async () => {
      let resolveLookup: (records: TrackEntry[]) => void = () => undefined;
      const slow = new Playlist('p-1', 'Slow', {
        config: testConfig,
        libraryProvider: {
          findByIds: () =>
            new Promise<TrackEntry[]>(resolve => {
              resolveLookup = resolve;
            }),
        },
      });

      const pending = slow.restore(buildSnapshot());
      slow.clear();
      resolveLookup([]);

      expect(await pending).toBe(false);
      expect(slow.size).toBe(0);
    });
  });

  describe('notifications', () => {
    it('should stop notifying after dispose', () => {
      const changes = vi.fn();
      playlist.on('structureChanged', changes);
      seed('A');
      playlist.dispose();
      seed('B');

      expect(changes).toHaveBeenCalledTimes(1);
    });

    it('should stop notifying an unsubscribed listener', () => {
      const changes = vi.fn();
      const subscription = playlist.on('structureChanged', changes);
      subscription.unsubscribe();
      seed('A');

      expect(changes).not.toHaveBeenCalled();
    });
  });
});
