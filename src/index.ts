/**
 * @file index.ts
 * @description Public surface of region-tracker.
 *
 * @example
 * ```typescript
 * import { RegionTracker, InsertStatus, LogMode } from 'region-tracker';
 *
 * const tracker = new RegionTracker(64, { logMode: LogMode.disabled });
 * tracker.addMetadata(1, 0, 16);
 * const placed = tracker.allocate(2, 8);
 * if (placed.status === InsertStatus.ok) console.log(placed.offset); // 16
 * ```
 */

export { RegionTracker, InsertStatus, describeStatus } from './core/tracker.js';
export type { AllocationResult } from './core/tracker.js';
export { IntervalIndex } from './core/interval-index.js';
export { LogMode, LOG_ENV_VAR, logModeFromEnv } from './core/options.js';
export type { TrackerOptions } from './core/options.js';
export { TrackerError, InvalidCapacityError } from './core/error.js';
export { printLayout, idMarker, layoutWidth, FILL_CHAR, LABEL_STEP, MAX_LAYOUT_WIDTH, TRUNCATION_MARK } from './core/render.js';
export type { LayoutSource } from './core/render.js';
export { regionEnd } from './core/types.js';
export type { RegionId, Offset, Region, Interval, IndexedInterval, RegionEntry } from './core/types.js';
export { StringWriter, ConsoleWriter } from './util/writer.js';
export type { Writer } from './util/writer.js';
