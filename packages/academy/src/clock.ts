/**
 * Clocks. Time is whole seconds since the Unix epoch.
 */

import type { Clock } from "@collegium/types";

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to. Never goes backwards.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  advance(seconds: number): void {
    if (seconds < 0) {
      throw new RangeError(`Cannot move the clock back by ${seconds}s`);
    }
    this._now += seconds;
  }

  set(timestamp: number): void {
    if (timestamp < this._now) {
      throw new RangeError(`Cannot move the clock back from ${this._now} to ${timestamp}`);
    }
    this._now = timestamp;
  }
}
