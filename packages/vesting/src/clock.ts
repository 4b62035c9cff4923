/**
 * Clocks
 *
 * Vesting is evaluated in whole seconds since the Unix epoch.
 */

import type { Clock } from "./types.js";

/** Latest second a Date can represent (±8.64e15 ms) */
export const MAX_CLOCK_SECONDS = 8_640_000_000_000;

function assertSeconds(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer number of seconds, got ${String(value)}`);
  }
}

function assertInRange(timestamp: number): void {
  if (timestamp > MAX_CLOCK_SECONDS) {
    throw new RangeError(`Clock time ${timestamp} is past ${MAX_CLOCK_SECONDS}`);
  }
}

/**
 * Wall-clock time, floored to seconds. Never reports a time earlier than
 * one it has already reported, even if the system clock steps back.
 */
export class SystemClock implements Clock {
  private _last = 0;

  now(): number {
    const current = Math.floor(Date.now() / 1000);
    if (current > this._last) {
      this._last = current;
    }
    return this._last;
  }
}

/**
 * A clock that only moves when told to. Used in tests and replays.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    assertSeconds(start, "start");
    assertInRange(start);
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  set(timestamp: number): void {
    assertSeconds(timestamp, "timestamp");
    assertInRange(timestamp);
    if (timestamp < this._now) {
      throw new RangeError(`Clock cannot move backwards from ${this._now} to ${timestamp}`);
    }
    this._now = timestamp;
  }

  advance(seconds: number): void {
    assertSeconds(seconds, "seconds");
    assertInRange(this._now + seconds);
    this._now += seconds;
  }
}
