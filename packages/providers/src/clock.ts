import type { Clock } from "./types.js";

export const defaultClock: Clock = {
  now: () => Date.now(),
};

/**
 * Manually advanced clock for tests and replay tools.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
