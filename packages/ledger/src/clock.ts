/**
 * @stakewell/ledger — Clocks.
 */

import type { UnixSeconds } from "@stakewell/types";
import type { Clock } from "./types.js";

/** Wall-clock time, truncated to whole seconds. */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to. Used by tests and replays.
 */
export class ManualClock implements Clock {
  private _now: UnixSeconds;

  constructor(start: UnixSeconds = 0) {
    this._now = start;
  }

  now(): UnixSeconds {
    return this._now;
  }

  /** Move forward by `seconds`. Negative values are rejected. */
  advance(seconds: number): UnixSeconds {
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new RangeError(`Clock can only advance by a non-negative integer, got ${String(seconds)}`);
    }
    this._now += seconds;
    return this._now;
  }

  /** Jump to an absolute time, which may not be in the past. */
  set(time: UnixSeconds): void {
    if (!Number.isSafeInteger(time) || time < this._now) {
      throw new RangeError(`Clock cannot move from ${String(this._now)} to ${String(time)}`);
    }
    this._now = time;
  }
}
