/**
 * MockCoordinatorLock — records leases for test assertions and stands in
 * for other processes through `lastRestartAt` and `failure`.
 */

import type { CoordinatorLock, LockError, LockLease } from "./coordinator-lock.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

export class MockCoordinatorLock implements CoordinatorLock {
  /** What the next lease reports; updated by every release that recorded a restart */
  public lastRestartAt: number | null = null;
  /** When set, acquire fails with this message */
  public failure: string | null = null;
  public acquired = 0;
  /** The restart time passed to each release, in order */
  public releases: Array<number | null> = [];
  public held = false;

  async acquire(): Promise<Result<LockLease, LockError>> {
    if (this.failure !== null) return err({ kind: "lock_failed", message: this.failure });
    if (this.held) return err({ kind: "lock_failed", message: "lock is already held" });
    this.held = true;
    this.acquired++;
    return ok({
      lastRestartAt: this.lastRestartAt,
      release: async (restartedAt) => {
        this.releases.push(restartedAt);
        if (restartedAt !== null) this.lastRestartAt = restartedAt;
        this.held = false;
      },
    });
  }
}
