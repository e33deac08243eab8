/**
 * FileCoordinatorLock — a lock directory in the state directory, taken with
 * proper-lockfile, plus a stamp file holding the last restart time.
 *
 * A held lock is refreshed while its process lives; a lock left behind by a
 * dead process goes stale and is taken over.
 */

import { join } from "node:path";
import lockfile from "proper-lockfile";
import type { CoordinatorLock, LockError, LockLease } from "./coordinator-lock.js";
import type { SystemOperations } from "./system-ops.js";
import type { Logger } from "./logger.js";
import type { Result } from "./result.js";
import { ok, err, errorMessage } from "./result.js";
import { formatFileSystemError } from "./types.js";
import { COORDINATOR_LOCK_DIR, RESTART_STAMP_FILE } from "./constants.js";

export type LockRetryPolicy = {
  retries: number;
  minTimeout: number;
  maxTimeout: number;
};

export type FileCoordinatorLockOptions = {
  /** The state directory; the lock and the stamp live here */
  ops: SystemOperations;
  logger: Logger;
  /** How long to keep trying while another process holds the lock */
  retry?: LockRetryPolicy;
  /** A lock not refreshed for this long belongs to a dead process */
  staleMs?: number;
};

const DEFAULT_RETRY: LockRetryPolicy = { retries: 120, minTimeout: 100, maxTimeout: 1_000 };
const DEFAULT_STALE_MS = 30_000;

export class FileCoordinatorLock implements CoordinatorLock {
  private readonly ops: SystemOperations;
  private readonly logger: Logger;
  private readonly retry: LockRetryPolicy;
  private readonly staleMs: number;

  constructor(options: FileCoordinatorLockOptions) {
    this.ops = options.ops;
    this.logger = options.logger;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
  }

  async acquire(): Promise<Result<LockLease, LockError>> {
    const dir = await this.ops.mkdir(".");
    if (!dir.ok) return err({ kind: "lock_failed", message: formatFileSystemError(dir.error) });

    let unlock: () => Promise<void>;
    try {
      unlock = await lockfile.lock(this.ops.root, {
        lockfilePath: join(this.ops.root, COORDINATOR_LOCK_DIR),
        realpath: false,
        stale: this.staleMs,
        retries: this.retry,
        onCompromised: (e) => {
          this.logger.error("Coordinator lock taken over by another process", { reason: e.message });
        },
      });
    } catch (e) {
      return err({ kind: "lock_failed", message: errorMessage(e) });
    }

    return ok({
      lastRestartAt: await this.readStamp(),
      release: async (restartedAt) => {
        if (restartedAt !== null) await this.writeStamp(restartedAt);
        try {
          await unlock();
        } catch (e) {
          this.logger.warn("Releasing the coordinator lock failed", { reason: errorMessage(e) });
        }
      },
    });
  }

  private async readStamp(): Promise<number | null> {
    const raw = await this.ops.readFile(RESTART_STAMP_FILE);
    if (!raw.ok) {
      if (raw.error.kind !== "not_found") {
        this.logger.warn("Cannot read the last restart time", { reason: formatFileSystemError(raw.error) });
      }
      return null;
    }
    const at = Number(raw.value.trim());
    if (!Number.isFinite(at)) {
      this.logger.warn("Ignoring a malformed last restart time", { value: raw.value.trim() });
      return null;
    }
    return at;
  }

  private async writeStamp(at: number): Promise<void> {
    const written = await this.ops.writeFile(RESTART_STAMP_FILE, `${at}\n`);
    if (!written.ok) {
      this.logger.warn("Cannot record the last restart time", {
        reason: formatFileSystemError(written.error),
      });
    }
  }
}
