/**
 * Monotonic timestamps and durations
 *
 * Timestamps are nanoseconds from `process.hrtime.bigint()`. The clock is shared
 * by every worker thread of the process, so stamps taken inside a worker can be
 * compared with stamps taken by the engine.
 */

export type Timestamp = bigint;

export interface Duration {
  seconds: number;
  nanoseconds: number;
}

const NS_PER_SECOND = 1_000_000_000n;

export const ZERO_DURATION: Duration = Object.freeze({ seconds: 0, nanoseconds: 0 });

export function now(): Timestamp {
  return process.hrtime.bigint();
}

/**
 * Elapsed time between two stamps, saturating at zero.
 * A missing stamp on either side yields a zero-length duration.
 */
export function elapsed(start: Timestamp | undefined, end: Timestamp | undefined): Duration {
  if (start === undefined || end === undefined || end <= start) {
    return ZERO_DURATION;
  }
  const diff = end - start;
  return {
    seconds: Number(diff / NS_PER_SECOND),
    nanoseconds: Number(diff % NS_PER_SECOND),
  };
}

export function formatDuration(duration: Duration): string {
  return `${duration.seconds}s ${duration.nanoseconds}ns`;
}
