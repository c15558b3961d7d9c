import { describe, it, expect, beforeEach } from 'vitest';
import { ITEM_STORE_INTERNALS, ItemStore, type ItemStoreInternals } from '../../domains/playlist/entities/ItemStore';
import { PlaylistNotifier } from '../../domains/playlist/events/PlaylistNotifier';
import {
  InsertItemsCommand,
  MoveItemsCommand,
  MutationLog,
  RemoveItemsCommand,
  ReorderItemsCommand,
  describeTracks,
} from '../../domains/playlist/undo';
import { titles, track } from '../fixtures';

describe('MutationLog', () => {
  let store: ItemStore;
  let internals: ItemStoreInternals;
  let log: MutationLog;

  beforeEach(() => {
    store = new ItemStore(new PlaylistNotifier());
    internals = store[ITEM_STORE_INTERNALS]();
    log = new MutationLog(100);
  });

  const seed = (...names: string[]) => store.insert(undefined, names.map(name => track(name)));
  const current = () => titles(store.entries());

  describe('commands', () => {
    it('should undo and redo an insert with the same items', () => {
      seed('A', 'B');
      const command = log.execute(new InsertItemsCommand(internals, 1, [track('X'), track('Y')]));

      expect(current()).toEqual(['A', 'X', 'Y', 'B']);
      expect(command.description).toBe('Add 2 tracks');
      expect(command.insertedAt).toBe(1);

      log.undo();
      expect(current()).toEqual(['A', 'B']);
      expect(store.indexOf(command.refs[0])).toBeNull();

      log.redo();
      expect(current()).toEqual(['A', 'X', 'Y', 'B']);
      expect(store.indexOf(command.refs[0])).toBe(1);
    });

    it('should remove several ranges as one step', () => {
      seed('A', 'B', 'C', 'D', 'E');
      const command = log.execute(
        new RemoveItemsCommand(internals, [
          { position: 0, count: 1 },
          { position: 2, count: 2 },
        ])
      );

      expect(current()).toEqual(['B', 'E']);
      expect(titles(command.removedEntries)).toEqual(['A', 'C', 'D']);
      expect(command.description).toBe('Remove 3 tracks');

      log.undo();
      expect(current()).toEqual(['A', 'B', 'C', 'D', 'E']);
    });

    it('should leave the log untouched when a removal is out of range', () => {
      seed('A', 'B');

      expect(() => log.execute(new RemoveItemsCommand(internals, [{ position: 5, count: 1 }]))).toThrowError(
        'Remove out of range: position 5, count 1, size 2'
      );
      expect(log.depth).toBe(0);
      expect(current()).toEqual(['A', 'B']);
    });

    it('should undo a move back to the original rows', () => {
      seed('A', 'B', 'C');
      const command = log.execute(new MoveItemsCommand(internals, [0, 2], 1));

      expect(current()).toEqual(['B', 'A', 'C']);
      expect(command.movedTo).toBe(1);
      expect(command.description).toBe('Move 2 tracks');

      log.undo();
      expect(current()).toEqual(['A', 'B', 'C']);
    });

    it('should undo a reorder', () => {
      seed('A', 'B', 'C');
      const reversed = [...internals.items()].reverse();
      log.execute(new ReorderItemsCommand(internals, reversed, 'Sort playlist'));

      expect(current()).toEqual(['C', 'B', 'A']);
      expect(log.undoText).toBe('Sort playlist');

      log.undo();
      expect(current()).toEqual(['A', 'B', 'C']);
    });

    it('should describe single and plural counts', () => {
      expect(describeTracks('Remove', 1)).toBe('Remove 1 track');
      expect(describeTracks('Add', 3)).toBe('Add 3 tracks');
    });
  });

  describe('stacks', () => {
    it('should keep insert-then-remove as two undo steps that cancel out', () => {
      seed('A');
      log.execute(new InsertItemsCommand(internals, undefined, [track('B')]));
      log.execute(new RemoveItemsCommand(internals, [{ position: 1, count: 1 }]));

      expect(current()).toEqual(['A']);
      expect(log.depth).toBe(2);

      log.undo();
      expect(current()).toEqual(['A', 'B']);
      log.undo();
      expect(current()).toEqual(['A']);
      expect(log.canUndo).toBe(false);
    });

    it('should drop the oldest command past capacity', () => {
      const small = new MutationLog(2);
      small.execute(new InsertItemsCommand(internals, undefined, [track('A')]));
      small.execute(new InsertItemsCommand(internals, undefined, [track('B')]));
      small.execute(new InsertItemsCommand(internals, undefined, [track('C')]));

      expect(small.depth).toBe(2);
      small.undo();
      small.undo();
      expect(small.undo()).toBeNull();
      expect(current()).toEqual(['A']);
    });

    it('should discard the redo stack on a new command', () => {
      log.execute(new InsertItemsCommand(internals, undefined, [track('A')]));
      log.undo();
      expect(log.canRedo).toBe(true);
      expect(log.redoText).toBe('Add 1 track');

      log.execute(new InsertItemsCommand(internals, undefined, [track('B')]));
      expect(log.canRedo).toBe(false);
      expect(log.redo()).toBeNull();
      expect(current()).toEqual(['B']);
    });

    it('should forget everything on clear', () => {
      log.execute(new InsertItemsCommand(internals, undefined, [track('A')]));
      log.clear();

      expect(log.canUndo).toBe(false);
      expect(log.undoText).toBeNull();
      expect(log.undo()).toBeNull();
    });
  });
});
