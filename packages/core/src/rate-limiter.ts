/**
 * RateLimiter — per-user sliding-window throttle.
 *
 * A window holds the timestamps of the user's recent allowed actions.
 * Entries older than the window are pruned on each check; an entry exactly
 * one window old still counts. A refused attempt is not recorded. Users
 * whose windows have emptied are swept at most once per window length.
 */

import { DEFAULT_RATE_LIMIT } from "./constants.js";

export type RateDecision = "allowed" | "limited";

export type RateLimitPolicy = {
  maxActions: number;
  windowSeconds: number;
};

export class RateLimiter {
  private windows: Map<number, number[]> = new Map();
  private readonly windowMs: number;
  private readonly maxActions: number;
  private lastSweep: number | null = null;

  constructor(policy: RateLimitPolicy = DEFAULT_RATE_LIMIT) {
    this.maxActions = policy.maxActions;
    this.windowMs = policy.windowSeconds * 1000;
  }

  check(userId: number, now: number): RateDecision {
    if (this.lastSweep === null || now - this.lastSweep >= this.windowMs) this.sweep(now);

    const window = this.prune(userId, now);
    if (window.length >= this.maxActions) return "limited";
    window.push(now);
    this.windows.set(userId, window);
    return "allowed";
  }

  /** Users with a tracked window */
  size(): number {
    return this.windows.size;
  }

  /** Drop windows with no entries left inside the window. Returns how many. */
  sweep(now: number): number {
    this.lastSweep = now;
    let dropped = 0;
    for (const userId of [...this.windows.keys()]) {
      if (this.prune(userId, now).length === 0) dropped++;
    }
    return dropped;
  }

  private prune(userId: number, now: number): number[] {
    const cutoff = now - this.windowMs;
    const window = (this.windows.get(userId) ?? []).filter((at) => at >= cutoff);
    if (window.length === 0) {
      this.windows.delete(userId);
    } else {
      this.windows.set(userId, window);
    }
    return window;
  }
}
