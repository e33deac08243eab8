/**
 * AccessStats — process-wide activity counters for the admin stats view.
 */

import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";

export type StatsCounter =
  | "joins"
  | "leaves"
  | "proxiesCreated"
  | "proxiesRemoved"
  | "errors"
  | "rateLimited";

export type StatsSnapshot = Record<StatsCounter, number> & {
  startedAt: number;
  uptimeMs: number;
};

export class AccessStats {
  private counts: Record<StatsCounter, number> = {
    joins: 0,
    leaves: 0,
    proxiesCreated: 0,
    proxiesRemoved: 0,
    errors: 0,
    rateLimited: 0,
  };
  readonly startedAt: number;

  constructor(private clock: Clock = systemClock) {
    this.startedAt = clock.now();
  }

  increment(counter: StatsCounter): void {
    this.counts[counter]++;
  }

  snapshot(): StatsSnapshot {
    return {
      ...this.counts,
      startedAt: this.startedAt,
      uptimeMs: this.clock.now() - this.startedAt,
    };
  }
}
