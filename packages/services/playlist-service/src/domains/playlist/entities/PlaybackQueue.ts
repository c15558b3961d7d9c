/**
 * In-memory play-next queue
 */

import type { IPlaybackQueue } from '../ports';

export class PlaybackQueue implements IPlaybackQueue {
  private queued: number[] = [];

  peekNext(): number | null {
    return this.queued[0] ?? null;
  }

  dequeue(): number | null {
    return this.queued.shift() ?? null;
  }

  isEmpty(): boolean {
    return this.queued.length === 0;
  }

  contains(row: number): boolean {
    return this.queued.includes(row);
  }

  enqueue(rows: number[]): void {
    for (const row of rows) {
      if (!this.queued.includes(row)) this.queued.push(row);
    }
  }

  rows(): number[] {
    return [...this.queued];
  }

  rowsInserted(start: number, count: number): void {
    this.queued = this.queued.map(row => (row >= start ? row + count : row));
  }

  rowsRemoved(start: number, count: number): void {
    const end = start + count;
    this.queued = this.queued
      .filter(row => row < start || row >= end)
      .map(row => (row >= end ? row - count : row));
  }

  rowsMoved(mapping: number[]): void {
    this.queued = this.queued.map(row => mapping[row] ?? row);
  }

  clear(): void {
    this.queued = [];
  }
}
