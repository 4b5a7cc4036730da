/**
 * @file interval-index.ts
 * @description Ordered index of occupied [start, end) intervals.
 *
 * Intervals are kept in a sorted array keyed on their start offset.  The
 * tracker guarantees that live intervals are non-empty and never overlap, so
 * start offsets are unique and the array is also sorted by end offset.
 */

import type { IndexedInterval, Offset } from './types.js';

export class IntervalIndex implements Iterable<IndexedInterval> {
  private intervals: IndexedInterval[] = [];

  /** Number of intervals */
  get size(): number {
    return this.intervals.length;
  }

  /** Remove every interval */
  clear(): void {
    this.intervals.length = 0;
  }

  /** Position of the first interval starting at or after `start` */
  private lowerBound(start: Offset): number {
    let lo = 0;
    let hi = this.intervals.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.intervals[mid].start < start) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  /**
   * Insert an interval at its sorted position.  The caller has already checked
   * it against findOverlap().
   */
  insert(interval: IndexedInterval): void {
    this.intervals.splice(this.lowerBound(interval.start), 0, interval);
  }

  /** Remove the interval beginning at `start`, if there is one */
  remove(start: Offset): void {
    const idx = this.lowerBound(start);
    const hit = this.intervals[idx];
    if (hit !== undefined && hit.start === start) this.intervals.splice(idx, 1);
  }

  /**
   * Find an interval intersecting [start, end).
   *
   * Only the neighbours of the insertion point can intersect: the interval
   * just before it (if it reaches past `start`) and the one at it (if it begins
   * before `end`).
   */
  findOverlap(start: Offset, end: Offset): IndexedInterval | undefined {
    const idx = this.lowerBound(start);
    const before = idx > 0 ? this.intervals[idx - 1] : undefined;
    if (before !== undefined && before.end > start) return before;
    const at = this.intervals[idx];
    if (at !== undefined && at.start < end) return at;
    return undefined;
  }

  /** Iterate intervals in ascending start order */
  *[Symbol.iterator](): IterableIterator<IndexedInterval> {
    for (const interval of this.intervals) {
      yield interval;
    }
  }
}
