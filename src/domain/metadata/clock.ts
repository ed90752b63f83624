/**
 * @lumberline/core - Timestamps
 *
 * @module domain/metadata/clock
 */

/**
 * Point in time stamped on every record.
 *
 * `epochMs` is wall-clock time for display and cross-process correlation;
 * `monotonicMs` never goes backwards and orders records produced by
 * different tasks of the same process.
 */
export interface Timestamp {
  readonly epochMs: number;
  readonly monotonicMs: number;
}

/**
 * Source of timestamps.
 */
export interface Clock {
  now(): Timestamp;
}

/**
 * Clock backed by `Date.now()` and `performance.now()`.
 */
export const systemClock: Clock = {
  now: () =>
    Object.freeze({
      epochMs: Date.now(),
      monotonicMs: performance.now(),
    }),
};

/**
 * Clock that always reports the same wall-clock time.
 *
 * The monotonic part still advances by one per reading so that records
 * stay ordered. Intended for tests that compare rendered output.
 */
export function fixedClock(epochMs: number): Clock {
  let tick = 0;
  return {
    now: () => Object.freeze({ epochMs, monotonicMs: tick++ }),
  };
}
