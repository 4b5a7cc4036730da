/**
 * @file error.ts
 * @description Exceptions raised by the tracker.
 *
 * Insertion, removal and lookup never throw; they report through their return
 * values. A TrackerError means the caller handed the tracker something it can
 * never work with.
 */

export class TrackerError extends Error {
  readonly explain: string;

  constructor(message: string) {
    super(message);
    this.name = 'TrackerError';
    this.explain = message;
  }
}

/** Raised when a tracker is constructed with an unusable capacity. */
export class InvalidCapacityError extends TrackerError {
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Capacity must be a non-negative safe integer, got ${capacity}`);
    this.name = 'InvalidCapacityError';
    this.capacity = capacity;
  }
}
