import { describe, it, expect } from 'vitest';
import { Playlist } from '../../domains/playlist/entities/Playlist';
import { SHUFFLE_MODES, type RandomSource } from '../../domains/playlist/entities/PlaybackOrder';
import type { TrackEntry } from '../../domains/playlist/value-objects';
import { libraryTrack, testConfig, track } from '../fixtures';

/** Park–Miller generator; the same seed always yields the same sequence */
function seeded(seed: number): RandomSource {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

const LIBRARY_IDS = ['lib-1', 'lib-2', 'lib-3', 'lib-4'];

function expectConsistent(playlist: Playlist): void {
  const size = playlist.size;
  const identity = Array.from({ length: size }, (_, row) => row);

  for (const mode of SHUFFLE_MODES) {
    playlist.setShuffleMode(mode);
    expect([...playlist.order.permutation()].sort((a, b) => a - b)).toEqual(identity);
  }
  playlist.setShuffleMode('off');

  const entries = playlist.entries();
  for (const libraryId of LIBRARY_IDS) {
    const expected = identity.filter(row => entries[row].libraryId === libraryId);
    expect(playlist.store.rowsForLibraryId(libraryId)).toEqual(expected);
  }
  const present = new Set(entries.flatMap(entry => (entry.libraryId ? [entry.libraryId] : [])));
  expect(playlist.store.libraryIds().sort()).toEqual([...present].sort());
}

describe('Playlist invariants under random edits', () => {
  it.each([7, 42, 1234, 99991])('should keep the play order and library index consistent (seed %i)', seed => {
    const random = seeded(seed);
    const pick = (bound: number) => Math.floor(random() * bound);
    const playlist = new Playlist('p-inv', 'Invariants', { config: testConfig, random });
    let serial = 0;

    const candidate = (): TrackEntry =>
      random() < 0.6
        ? libraryTrack(LIBRARY_IDS[pick(LIBRARY_IDS.length)], { album: `Album ${pick(3)}`, artist: `Artist ${pick(2)}` })
        : track(`U${++serial}`, { album: `Album ${pick(3)}` });

    for (let step = 0; step < 200; step++) {
      const size = playlist.size;
      const op = pick(8);

      if (op <= 1 || size === 0) {
        const entries = Array.from({ length: 1 + pick(3) }, candidate);
        playlist.insertEntries(entries, { position: pick(size + 2) - 1 });
      } else if (op === 2) {
        const position = pick(size);
        playlist.removeRows(position, pick(size - position + 1));
      } else if (op === 3) {
        const rows = Array.from({ length: 1 + pick(Math.min(size, 3)) }, () => pick(size));
        playlist.moveRows(rows, pick(size + 1));
      } else if (op === 4) {
        playlist.undo();
      } else if (op === 5) {
        playlist.redo();
      } else if (op === 6) {
        playlist.sort(random() < 0.5 ? 'title' : 'album', random() < 0.5 ? 'asc' : 'desc');
      } else {
        const libraryId = LIBRARY_IDS[pick(LIBRARY_IDS.length)];
        playlist.onLibraryRecordsChanged([libraryTrack(libraryId, { title: `${libraryId} v${step}` })]);
      }

      expectConsistent(playlist);
    }
  });
});
