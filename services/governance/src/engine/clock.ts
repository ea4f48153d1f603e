import type { Clock } from "../types.js";

/** Wall-clock unix seconds */
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock that only moves when told to. Used by tests and the scenario runner.
 */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) {
      throw new RangeError(`Clock cannot move backwards (${this.current} -> ${timestamp})`);
    }
    this.current = timestamp;
  }

  advance(seconds: number): number {
    this.set(this.current + seconds);
    return this.current;
  }
}
