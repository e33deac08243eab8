/**
 * ProxyAccessCoordinator — the single writer of the daemon's configuration.
 *
 * Every mutation runs the whole sequence
 *   take lock → wait for cooldown → parse → mutate → persist → restart daemon → record restart
 * inside one serial queue, so at most one sequence runs at a time across all
 * secrets. The CoordinatorLock extends that to other processes managing the
 * same daemon and shares the last restart time with them. The cooldown sleep
 * happens while holding both, which caps the daemon at one restart per
 * cooldown window.
 *
 * Per operation:
 *   idle → awaiting_cooldown → config_loaded → noop_success
 *                                            → mutated → daemon_restarting → success | failed
 *
 * The coordinator never touches the user registry; callers update it after
 * a successful result.
 */

import type { ConfigStore, ConfigReadError } from "./config-store.js";
import { formatConfigReadError } from "./config-store.js";
import type { DaemonControl, DaemonControlError } from "./daemon-control.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { Logger } from "./logger.js";
import type { DaemonConfig, FileSystemError } from "./types.js";
import { formatFileSystemError, redactSecret } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";
import { SerialQueue } from "./serial-queue.js";
import type { CoordinatorLock, LockError } from "./coordinator-lock.js";
import { processLocalLock } from "./coordinator-lock.js";
import type { QueueFullError } from "./serial-queue.js";
import { timeUntilReady } from "./cooldown.js";
import { isHexToken } from "./secret.js";
import { DEFAULT_COOLDOWN_SECONDS, DEFAULT_QUEUE_CAPACITY } from "./constants.js";

// ── Types ──────────────────────────────────────────────────────────────

export type OperationPhase =
  | "idle"
  | "awaiting_cooldown"
  | "config_loaded"
  | "noop_success"
  | "mutated"
  | "daemon_restarting"
  | "success"
  | "failed";

export type OperationError =
  | { kind: "invalid_secret"; secret: string }
  | QueueFullError
  | LockError
  | { kind: "config_unreadable"; error: ConfigReadError }
  | { kind: "write_failed"; error: FileSystemError }
  | {
      kind: "daemon_control_failed";
      step: "reload" | "start" | "is-active";
      message: string;
      /** The unit file already holds the new config; it is not rolled back */
      configWritten: boolean;
    }
  | { kind: "daemon_not_active" };

export type SecretChanges = {
  add?: string[];
  remove?: string[];
};

export type Applied = {
  /** Secrets that were not admitted before */
  added: string[];
  /** Secrets that were admitted before */
  removed: string[];
  /** Whether the daemon went through a restart */
  restarted: boolean;
  /** The configuration now persisted */
  config: DaemonConfig;
};

export type Admitted = { secret: string; changed: boolean };
export type Removed = { secret: string; changed: boolean };
export type Restarted = { at: number };

export type CoordinatorOptions = {
  store: ConfigStore;
  daemon: DaemonControl;
  logger: Logger;
  clock?: Clock;
  cooldownSeconds?: number;
  /** Operations allowed queued or running; further calls fail with queue_full */
  queueCapacity?: number;
  /** Shared with other processes managing the daemon; process-local by default */
  lock?: CoordinatorLock;
};

export function formatOperationError(error: OperationError): string {
  switch (error.kind) {
    case "invalid_secret":
      return `not a valid secret: ${JSON.stringify(error.secret)}`;
    case "queue_full":
      return `too many pending operations (capacity ${error.capacity})`;
    case "lock_failed":
      return `cannot take the coordinator lock: ${error.message}`;
    case "config_unreadable":
      return formatConfigReadError(error.error);
    case "write_failed":
      return `cannot write unit file (${formatFileSystemError(error.error)})`;
    case "daemon_control_failed":
      return error.configWritten
        ? `daemon ${error.step} failed after the unit file was updated: ${error.message}`
        : `daemon ${error.step} failed: ${error.message}`;
    case "daemon_not_active":
      return "daemon is not running after restart";
  }
}

/** Next secret list: removals first, then additions not already present. */
export function nextSecrets(current: string[], add: string[], remove: string[]): string[] {
  const removing = new Set(remove);
  const next = current.filter((s) => !removing.has(s));
  for (const secret of add) {
    if (!next.includes(secret)) next.push(secret);
  }
  return next;
}

// ── Coordinator ────────────────────────────────────────────────────────

export class ProxyAccessCoordinator {
  private readonly store: ConfigStore;
  private readonly daemon: DaemonControl;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly cooldownSeconds: number;
  private readonly queue: SerialQueue;
  private readonly lock: CoordinatorLock;
  private lastRestart: number | null = null;
  private operationCount = 0;

  constructor(options: CoordinatorOptions) {
    this.store = options.store;
    this.daemon = options.daemon;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.cooldownSeconds = options.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS;
    this.queue = new SerialQueue(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this.lock = options.lock ?? processLocalLock;
  }

  /** When the daemon last restarted successfully (epoch ms), or null */
  lastRestartAt(): number | null {
    return this.lastRestart;
  }

  /** Operations queued or running */
  pending(): number {
    return this.queue.size;
  }

  /** Admit a secret. Already admitted is a success with `changed: false`. */
  async addSecret(secret: string): Promise<Result<Admitted, OperationError>> {
    const result = await this.apply({ add: [secret] });
    if (!result.ok) return result;
    return ok({ secret: secret.toLowerCase(), changed: result.value.added.length > 0 });
  }

  /** Evict a secret. Not admitted is a success with `changed: false`. */
  async removeSecret(secret: string): Promise<Result<Removed, OperationError>> {
    const result = await this.apply({ remove: [secret] });
    if (!result.ok) return result;
    return ok({ secret: secret.toLowerCase(), changed: result.value.removed.length > 0 });
  }

  /** Admit and evict several secrets with at most one restart. */
  async apply(changes: SecretChanges): Promise<Result<Applied, OperationError>> {
    const add = (changes.add ?? []).map((s) => s.toLowerCase());
    const remove = (changes.remove ?? []).map((s) => s.toLowerCase());
    const invalid = [...add, ...remove].find((s) => !isHexToken(s));
    if (invalid !== undefined) return err({ kind: "invalid_secret", secret: invalid });

    const queued = this.queue.run(() => this.locked((op) => this.mutate(op, add, remove)));
    if (!queued.ok) {
      this.logger.warn("Coordinator queue full, shedding operation", {
        capacity: queued.error.capacity,
      });
      return queued;
    }
    return queued.value;
  }

  /** Restart the daemon without touching its configuration. */
  async restartDaemon(): Promise<Result<Restarted, OperationError>> {
    const queued = this.queue.run(() => this.locked((op) => this.restart(op)));
    if (!queued.ok) return queued;
    return queued.value;
  }

  // ── Internals (run inside the queue) ─────────────────────────────────

  private async restart(op: number): Promise<Result<Restarted, OperationError>> {
    await this.awaitCooldown(op);

    const cycled = await this.cycle(op, { reload: false, configWritten: false });
    if (!cycled.ok) return cycled;

    const active = await this.daemon.isActive();
    if (!active.ok) return this.controlFailed(op, active.error, false);
    if (!active.value) {
      this.transition(op, "failed");
      this.logger.error(`${this.daemon.service} is not active after restart`, { op });
      return err({ kind: "daemon_not_active" });
    }

    this.transition(op, "success");
    this.logger.info(`Restarted ${this.daemon.service}`, { op });
    return ok({ at: cycled.value });
  }

  /**
   * Hold the cross-process lock for one sequence. The newer of our own and
   * the lease's last restart drives the cooldown; a restart made while
   * holding the lock is handed back on release.
   */
  private async locked<T>(
    sequence: (op: number) => Promise<Result<T, OperationError>>,
  ): Promise<Result<T, OperationError>> {
    const op = this.begin();
    const lease = await this.lock.acquire();
    if (!lease.ok) {
      this.transition(op, "failed");
      this.logger.error("Cannot take the coordinator lock", { op, reason: lease.error.message });
      return lease;
    }

    const shared = lease.value.lastRestartAt;
    if (shared !== null && (this.lastRestart === null || shared > this.lastRestart)) {
      this.lastRestart = shared;
    }
    const before = this.lastRestart;
    try {
      return await sequence(op);
    } finally {
      await lease.value.release(this.lastRestart !== before ? this.lastRestart : null);
    }
  }

  private begin(): number {
    const op = ++this.operationCount;
    this.transition(op, "idle");
    return op;
  }

  private transition(op: number, phase: OperationPhase): void {
    this.logger.debug("Coordinator phase", { op, phase });
  }

  private async awaitCooldown(op: number): Promise<void> {
    this.transition(op, "awaiting_cooldown");
    const wait = timeUntilReady(this.clock.now(), this.lastRestart, this.cooldownSeconds);
    if (wait > 0) {
      this.logger.info(`Waiting ${(wait / 1000).toFixed(1)}s for restart cooldown`, { op });
      await this.clock.sleep(wait);
    }
  }

  private async mutate(
    op: number,
    add: string[],
    remove: string[],
  ): Promise<Result<Applied, OperationError>> {
    await this.awaitCooldown(op);

    const current = await this.store.parse();
    if (!current.ok) {
      this.transition(op, "failed");
      this.logger.error("Daemon config unreadable", {
        op,
        reason: formatConfigReadError(current.error),
      });
      return err({ kind: "config_unreadable", error: current.error });
    }
    this.transition(op, "config_loaded");

    const before = current.value.secrets;
    const secrets = nextSecrets(before, add, remove);
    const added = secrets.filter((s) => !before.includes(s));
    const removed = before.filter((s) => !secrets.includes(s));

    if (added.length === 0 && removed.length === 0) {
      this.transition(op, "noop_success");
      for (const s of add) this.logger.info(`Secret already admitted: ${redactSecret(s)}`, { op });
      for (const s of remove) this.logger.info(`Secret not admitted: ${redactSecret(s)}`, { op });
      return ok({ added, removed, restarted: false, config: current.value });
    }

    const config: DaemonConfig = { ...current.value, secrets };
    const written = await this.store.write(config);
    if (!written.ok) {
      this.transition(op, "failed");
      this.logger.error("Cannot write daemon config", {
        op,
        reason: formatFileSystemError(written.error.error),
      });
      return err({ kind: "write_failed", error: written.error.error });
    }
    this.transition(op, "mutated");

    const cycled = await this.cycle(op, { reload: true, configWritten: true });
    if (!cycled.ok) return cycled;

    this.transition(op, "success");
    for (const s of added) this.logger.info(`Added secret: ${redactSecret(s)}`, { op });
    for (const s of removed) this.logger.info(`Removed secret: ${redactSecret(s)}`, { op });
    return ok({ added, removed, restarted: true, config });
  }

  /**
   * stop → [reload] → start. A failed stop is logged and tolerated; a
   * stopped daemon cannot meaningfully fail to stop. Returns the restart time.
   */
  private async cycle(
    op: number,
    opts: { reload: boolean; configWritten: boolean },
  ): Promise<Result<number, OperationError>> {
    this.transition(op, "daemon_restarting");

    const stopped = await this.daemon.stop();
    if (!stopped.ok) {
      this.logger.warn(`Stopping ${this.daemon.service} failed, continuing`, {
        op,
        reason: stopped.error.message,
      });
    }

    if (opts.reload) {
      const reloaded = await this.daemon.reloadManager();
      if (!reloaded.ok) return this.controlFailed(op, reloaded.error, opts.configWritten);
    }

    const started = await this.daemon.start();
    if (!started.ok) return this.controlFailed(op, started.error, opts.configWritten);

    const at = this.clock.now();
    this.lastRestart = at;
    return ok(at);
  }

  private controlFailed(
    op: number,
    error: DaemonControlError,
    configWritten: boolean,
  ): Result<never, OperationError> {
    const step = error.step === "stop" ? "start" : error.step;
    this.transition(op, "failed");
    this.logger.error(`${this.daemon.service} ${step} failed`, {
      op,
      reason: error.message,
      configWritten,
    });
    return err({ kind: "daemon_control_failed", step, message: error.message, configWritten });
  }
}
