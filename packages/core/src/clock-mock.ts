/**
 * FakeClock — deterministic Clock for tests. sleep() advances time
 * instead of waiting.
 */

import type { Clock } from "./clock.js";

export class FakeClock implements Clock {
  private current: number;
  /** Every sleep requested, in order */
  public sleeps: number[] = [];

  constructor(start = Date.UTC(2026, 0, 1)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
