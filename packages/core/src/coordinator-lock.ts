/**
 * CoordinatorLock — mutual exclusion for the coordinator's sequences across
 * every process that manages the same daemon (the bot and the CLI).
 *
 * A lease also carries the time of the last restart any holder recorded,
 * so the restart cooldown holds across processes too.
 */

import type { Result } from "./result.js";
import { ok } from "./result.js";

export type LockError = { kind: "lock_failed"; message: string };

export type LockLease = {
  /** Last restart recorded by any holder (epoch ms), or null */
  lastRestartAt: number | null;
  /** Give the lock up, recording a restart made while holding it. Never rejects. */
  release(restartedAt: number | null): Promise<void>;
};

export interface CoordinatorLock {
  acquire(): Promise<Result<LockLease, LockError>>;
}

/** For a coordinator that is the only one managing its daemon. */
export const processLocalLock: CoordinatorLock = {
  async acquire() {
    return ok({ lastRestartAt: null, release: async () => undefined });
  },
};
