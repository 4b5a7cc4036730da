/**
 * @file types.ts
 * @description Value types shared by the tracker, its interval index and the
 * layout printer.
 *
 * Offsets and lengths are plain numbers restricted to non-negative safe
 * integers; identifiers are safe integers of either sign.
 */

/** Caller-assigned region identifier. Opaque: no ordering is implied. */
export type RegionId = number;

/** Offset into the tracked address space */
export type Offset = number;

/** Placement of one live region */
export interface Region {
  readonly offset: Offset;
  readonly length: number;
}

/** Half-open range [start, end) */
export interface Interval {
  readonly start: Offset;
  readonly end: Offset;
}

/** An occupied interval together with the region that owns it */
export interface IndexedInterval extends Interval {
  readonly id: RegionId;
}

/** A live region as seen by ordered traversal */
export interface RegionEntry extends Region {
  readonly id: RegionId;
}

/** One past the last offset covered by a region */
export function regionEnd(region: Region): Offset {
  return region.offset + region.length;
}

/** True if `n` can be used as an offset, length or capacity */
export function isUnsigned(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}
