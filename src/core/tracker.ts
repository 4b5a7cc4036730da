/**
 * @file tracker.ts
 * @description Bookkeeping for named, non-overlapping regions inside a
 * fixed-capacity linear address space.
 *
 * The tracker never touches backing storage; it only records where each region
 * would live.  State is split across two structures that every mutation keeps
 * in step:
 *   - the region store, id -> (offset, length), for lookup by identifier
 *   - the interval index, ordered by start offset, for gap scans and overlap
 *     tests
 */

import { InvalidCapacityError } from './error.js';
import { IntervalIndex } from './interval-index.js';
import { LogMode, logModeFromEnv } from './options.js';
import type { TrackerOptions } from './options.js';
import { printLayout } from './render.js';
import { isUnsigned } from './types.js';
import type { Interval, Offset, Region, RegionEntry, RegionId } from './types.js';
import { ConsoleWriter, StringWriter } from '../util/writer.js';
import type { Writer } from '../util/writer.js';

/** Outcome of an insertion attempt */
export enum InsertStatus {
  ok = 0,
  /** An argument is not a safe integer, or an offset/length is negative */
  invalid_argument = 1,
  duplicate_id = 2,
  /** Zero-length regions are not tracked */
  empty_region = 3,
  out_of_bounds = 4,
  collision = 5,
  /** allocate() found no gap large enough */
  no_space = 6,
}

type RejectStatus = Exclude<InsertStatus, InsertStatus.ok>;

/** Outcome of allocate(): the chosen offset on success */
export type AllocationResult =
  | { status: InsertStatus.ok; offset: Offset }
  | { status: RejectStatus };

const REJECT_REASON: Record<RejectStatus, string> = {
  [InsertStatus.invalid_argument]: 'invalid argument',
  [InsertStatus.duplicate_id]: 'duplicate identifier',
  [InsertStatus.empty_region]: 'empty region',
  [InsertStatus.out_of_bounds]: 'out of bounds',
  [InsertStatus.collision]: 'collision',
  [InsertStatus.no_space]: 'no space',
};

/** Human-readable reason for a rejected insertion */
export function describeStatus(status: InsertStatus): string {
  return status === InsertStatus.ok ? 'ok' : REJECT_REASON[status];
}

export class RegionTracker {
  private readonly _capacity: number;
  private readonly logMode: LogMode;
  private readonly writer: Writer;
  private readonly dumpState: boolean;
  private readonly metadata = new Map<RegionId, Region>();
  private readonly occupied = new IntervalIndex();
  private _traceError: unknown = undefined;

  /**
   * @param capacity size of the address space; fixed for the tracker's lifetime
   * @throws InvalidCapacityError if capacity is not a non-negative safe integer
   */
  constructor(capacity: number, options: TrackerOptions = {}) {
    if (!isUnsigned(capacity)) throw new InvalidCapacityError(capacity);
    this._capacity = capacity;
    this.logMode = options.logMode ?? logModeFromEnv();
    this.writer = options.writer ?? new ConsoleWriter();
    this.dumpState = options.dumpState ?? false;
  }

  get capacity(): number {
    return this._capacity;
  }

  /** Number of live regions */
  get size(): number {
    return this.metadata.size;
  }

  get loggingEnabled(): boolean {
    return this.logMode === LogMode.enabled;
  }

  /** The most recent error thrown by the writer, if any */
  get lastTraceError(): unknown {
    return this._traceError;
  }

  /**
   * Emit one trace line.  The message is built lazily so a tracker with
   * logging disabled pays nothing for formatting.
   *
   * Tracing runs after a mutation has been committed, so a failing writer must
   * not turn a completed operation into a thrown one.  Its error is kept in
   * lastTraceError instead.
   */
  private log(message: () => string): void {
    if (this.logMode !== LogMode.enabled) return;
    try {
      this.writer.write('[LOG]: ' + message() + '\n');
      if (this.dumpState) {
        printLayout(this, this.writer);
        this.writer.write('\n');
      }
    } catch (err) {
      this._traceError = err;
    }
  }

  /**
   * First-fit search for `length` free cells.
   * @returns the lowest offset of a gap that fits, or undefined if none fits
   * or `length` is not a non-negative safe integer
   */
  findContiguousSpace(length: number): Offset | undefined {
    if (!isUnsigned(length)) return undefined;
    let lastEnd = 0;
    for (const { start, end } of this.occupied) {
      if (start - lastEnd >= length) return lastEnd;
      lastEnd = end;
    }
    if (this._capacity - lastEnd >= length) return lastEnd;
    return undefined;
  }

  /**
   * Checks that do not depend on where the region goes: argument shape,
   * identifier uniqueness and emptiness.
   */
  private checkRequest(id: RegionId, start: Offset, length: number): RejectStatus | undefined {
    if (!Number.isSafeInteger(id) || !isUnsigned(start) || !isUnsigned(length))
      return InsertStatus.invalid_argument;
    if (this.metadata.has(id)) return InsertStatus.duplicate_id;
    if (length === 0) return InsertStatus.empty_region;
    return undefined;
  }

  /**
   * Record a region at [start, start+length).  On any rejection the tracker is
   * left exactly as it was.
   */
  addMetadata(id: RegionId, start: Offset, length: number): InsertStatus {
    const fields = (): string => `ID=${id}, start=${start}, length=${length}`;
    const reject = (status: RejectStatus, detail?: string): InsertStatus => {
      this.log(() => `add rejected (${detail ?? REJECT_REASON[status]}): ${fields()}`);
      return status;
    };

    const invalid = this.checkRequest(id, start, length);
    if (invalid !== undefined) return reject(invalid);
    const end = start + length;
    if (end > this._capacity) return reject(InsertStatus.out_of_bounds);
    const other = this.occupied.findOverlap(start, end);
    if (other !== undefined) return reject(InsertStatus.collision, `collision with ID=${other.id}`);

    this.metadata.set(id, { offset: start, length });
    this.occupied.insert({ start, end, id });
    this.log(() => `add: ${fields()}`);
    return InsertStatus.ok;
  }

  /**
   * Place a region of `length` cells in the first gap that fits.
   */
  allocate(id: RegionId, length: number): AllocationResult {
    const fields = (): string => `ID=${id}, length=${length}`;
    const invalid = this.checkRequest(id, 0, length);
    if (invalid !== undefined) {
      this.log(() => `allocate rejected (${REJECT_REASON[invalid]}): ${fields()}`);
      return { status: invalid };
    }
    const offset = this.findContiguousSpace(length);
    if (offset === undefined) {
      this.log(() => `allocate rejected (${REJECT_REASON[InsertStatus.no_space]}): ${fields()}`);
      return { status: InsertStatus.no_space };
    }
    const status = this.addMetadata(id, offset, length);
    if (status !== InsertStatus.ok) return { status };
    return { status, offset };
  }

  /**
   * Forget a region.  Unknown identifiers are traced and otherwise ignored.
   * @returns true if a region was removed
   */
  removeMetadata(id: RegionId): boolean {
    const region = this.metadata.get(id);
    if (region === undefined) {
      this.log(() => `remove: ID=${id} not found`);
      return false;
    }
    this.occupied.remove(region.offset);
    this.metadata.delete(id);
    this.log(() => `remove: ID=${id}, start=${region.offset}, length=${region.length}`);
    return true;
  }

  getMetadata(id: RegionId): Region | undefined {
    return this.metadata.get(id);
  }

  has(id: RegionId): boolean {
    return this.metadata.has(id);
  }

  /** Every live region keyed by id.  Iteration order is unspecified. */
  getAllMetadata(): ReadonlyMap<RegionId, Region> {
    return this.metadata;
  }

  /** Live regions in ascending offset order */
  *regions(): IterableIterator<RegionEntry> {
    for (const { start, end, id } of this.occupied) {
      yield { id, offset: start, length: end - start };
    }
  }

  /** Total cells held by live regions */
  getUsedSpace(): number {
    let used = 0;
    for (const region of this.metadata.values()) {
      used += region.length;
    }
    return used;
  }

  getFreeSpace(): number {
    return this._capacity - this.getUsedSpace();
  }

  /**
   * Fraction of the capacity held by live regions, in [0, 1].
   * A zero-capacity tracker reports 0.
   */
  getUsagePercentage(): number {
    if (this._capacity === 0) return 0;
    return this.getUsedSpace() / this._capacity;
  }

  /** Every free gap, in ascending order */
  getFreeIntervals(): Interval[] {
    const gaps: Interval[] = [];
    let lastEnd = 0;
    for (const { start, end } of this.occupied) {
      if (start > lastEnd) gaps.push({ start: lastEnd, end: start });
      lastEnd = end;
    }
    if (this._capacity > lastEnd) gaps.push({ start: lastEnd, end: this._capacity });
    return gaps;
  }

  /** Length of the largest free gap, 0 when full */
  getLargestFreeBlock(): number {
    let largest = 0;
    for (const gap of this.getFreeIntervals()) {
      largest = Math.max(largest, gap.end - gap.start);
    }
    return largest;
  }

  /**
   * Slide every region down so that they occupy [0, used) with no gaps.
   * Relative order, lengths and identifiers are preserved.
   */
  compact(): void {
    const ordered = [...this.metadata.entries()].sort((a, b) => a[1].offset - b[1].offset);
    let cursor = 0;
    this.occupied.clear();
    for (const [id, region] of ordered) {
      this.metadata.set(id, { offset: cursor, length: region.length });
      this.occupied.insert({ start: cursor, end: cursor + region.length, id });
      cursor += region.length;
    }
    this.log(() => `compact: regions=${ordered.length}, used=${cursor}`);
  }

  /** Write the layout dump */
  printRaw(w: Writer): void {
    printLayout(this, w);
  }

  toString(): string {
    const w = new StringWriter();
    this.printRaw(w);
    return w.toString();
  }
}
