/**
 * Clock — time source for cooldowns and rate windows.
 */

import { setTimeout as delay } from "node:timers/promises";

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolve after `ms` milliseconds without blocking the event loop */
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};
