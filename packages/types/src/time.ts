/**
 * Time Types
 *
 * All time-gated logic reads a trusted, non-decreasing epoch counter.
 * The clock is always injected so maturity and voting windows stay
 * deterministic under test.
 */

/** Whole seconds since the Unix epoch. */
export type EpochSeconds = number;

/** Seconds in a (non-leap) year, used for annualized yield. */
export const SECONDS_PER_YEAR = 365 * 86_400;

/**
 * Source of the ledger's notion of "now".
 */
export interface Clock {
  now(): EpochSeconds;
}

/**
 * Wall-clock source, truncated to whole seconds.
 * Never goes backwards within a process.
 */
export class SystemClock implements Clock {
  private last = 0;

  now(): EpochSeconds {
    const current = Math.floor(Date.now() / 1000);
    this.last = Math.max(this.last, current);
    return this.last;
  }
}

/**
 * Manually driven clock for tests and replays.
 */
export class ManualClock implements Clock {
  private current: EpochSeconds;

  constructor(start: EpochSeconds = 0) {
    this.current = start;
  }

  now(): EpochSeconds {
    return this.current;
  }

  /** Move forward by `seconds`. Negative steps are rejected. */
  advance(seconds: number): EpochSeconds {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new RangeError(`Clock can only advance by a non-negative integer, got ${seconds}`);
    }
    this.current += seconds;
    return this.current;
  }

  /** Jump to an absolute time, which must not be in the past. */
  set(to: EpochSeconds): EpochSeconds {
    if (!Number.isInteger(to) || to < this.current) {
      throw new RangeError(`Clock cannot move from ${this.current} to ${to}`);
    }
    this.current = to;
    return this.current;
  }
}

/**
 * Render epoch seconds as an ISO 8601 timestamp.
 */
export function toIsoTimestamp(seconds: EpochSeconds): string {
  return new Date(seconds * 1000).toISOString();
}
