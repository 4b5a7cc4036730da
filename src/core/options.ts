/**
 * @file options.ts
 * @description Construction-time configuration for a RegionTracker.
 */

import type { Writer } from '../util/writer.js';

/** Whether the tracker emits trace messages */
export enum LogMode {
  disabled = 0,
  enabled = 1,
}

/** Environment variable consulted when no log mode is passed explicitly */
export const LOG_ENV_VAR = 'REGION_TRACKER_LOG';

export interface TrackerOptions {
  /** Defaults to the value derived from REGION_TRACKER_LOG */
  logMode?: LogMode;
  /** Destination for trace lines. Defaults to stdout. */
  writer?: Writer;
  /** Print the layout dump after every trace line */
  dumpState?: boolean;
}

const TRUTHY = new Set(['1', 'true', 'on', 'yes']);

/**
 * Derive the log mode from the environment.  Anything other than
 * 1/true/on/yes (case-insensitive) leaves logging off.
 */
export function logModeFromEnv(env: NodeJS.ProcessEnv = process.env): LogMode {
  const raw = env[LOG_ENV_VAR];
  if (raw === undefined) return LogMode.disabled;
  return TRUTHY.has(raw.trim().toLowerCase()) ? LogMode.enabled : LogMode.disabled;
}
