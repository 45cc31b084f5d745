export interface Clock {
  /** unix timestamp, in seconds */
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock moved by hand, for tests and replays
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number) {
    if (timestamp < this.current) {
      throw new Error(`ManualClock: cannot go back in time from ${this.current} to ${timestamp}`);
    }
    this.current = timestamp;
  }

  /** move to `timestamp` unless the clock is already past it */
  advanceTo(timestamp: number) {
    if (timestamp > this.current) {
      this.current = timestamp;
    }
  }

  advance(seconds: number) {
    this.set(this.current + seconds);
  }
}
