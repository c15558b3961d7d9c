/**
 * Play-next queue kept beside a playlist. Rows are store indices; the
 * playlist reports every structural change so the queue can renumber.
 */
export interface IPlaybackQueue {
  peekNext(): number | null;
  dequeue(): number | null;
  isEmpty(): boolean;
  contains(row: number): boolean;
  enqueue(rows: number[]): void;
  rows(): number[];
  rowsInserted(start: number, count: number): void;
  rowsRemoved(start: number, count: number): void;
  /** `mapping[oldRow]` is the row's new index */
  rowsMoved(mapping: number[]): void;
  clear(): void;
}
