/**
 * MembershipReconciler — keeps proxy access in step with channel membership.
 *
 * join:  rate gate → active record? restore notice : mint secret → addSecret → upsert → granted notice
 * leave: rate gate → active record? removeSecret → deactivate → revoked notice : nothing
 *
 * Grants and revocations for one user run one at a time, so no other change
 * for that user lands between a sequence's registry check and its registry
 * write. The registry is written only after the coordinator succeeded.
 * Notices go out after the registry write, on their own promise; a failed
 * notice is logged and never changes the outcome.
 */

import type { ProxyAccessCoordinator } from "./coordinator.js";
import { formatOperationError } from "./coordinator.js";
import type { UserRegistry, RegistryError } from "./registry.js";
import { formatRegistryError } from "./registry.js";
import type { Notice, NoticeFormatter, Notifier } from "./membership.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { ProxyLinks } from "./proxy-links.js";
import type { AccessStats } from "./stats.js";
import type { AccessError } from "./access-error.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { Logger } from "./logger.js";
import type { UserRecord } from "./types.js";
import { redactSecret } from "./types.js";
import type { Result } from "./result.js";
import { ok, err, errorMessage } from "./result.js";
import { generateSecret } from "./secret.js";

// ── Types ──────────────────────────────────────────────────────────────

export type ProvisionOutcome =
  | { kind: "granted"; record: UserRecord }
  | { kind: "already_active"; record: UserRecord };

export type JoinOutcome = ProvisionOutcome | { kind: "rate_limited" };

export type LeaveOutcome =
  | { kind: "revoked"; record: UserRecord }
  | { kind: "no_active_access" }
  | { kind: "rate_limited" };

export type ReconcilerOptions = {
  coordinator: ProxyAccessCoordinator;
  registry: UserRegistry;
  notifier: Notifier;
  formatNotice: NoticeFormatter;
  links: ProxyLinks;
  limiter: RateLimiter;
  stats: AccessStats;
  logger: Logger;
  clock?: Clock;
  /** Source of new secrets */
  mintSecret?: () => string;
};

// ── Reconciler ─────────────────────────────────────────────────────────

export class MembershipReconciler {
  private readonly opts: ReconcilerOptions;
  private readonly clock: Clock;
  private readonly mintSecret: () => string;
  private readonly pending: Set<Promise<void>> = new Set();
  private readonly userTails: Map<number, Promise<void>> = new Map();

  constructor(options: ReconcilerOptions) {
    this.opts = options;
    this.clock = options.clock ?? systemClock;
    this.mintSecret = options.mintSecret ?? generateSecret;
  }

  async onJoin(userId: number, displayName: string): Promise<Result<JoinOutcome, AccessError>> {
    const { stats, logger } = this.opts;
    if (!this.admit(userId)) return ok({ kind: "rate_limited" });

    stats.increment("joins");
    logger.info(`User ${userId} joined the channel`, { joins: stats.snapshot().joins });

    const provisioned = await this.provision(userId, displayName);
    if (!provisioned.ok) return provisioned;

    const { record } = provisioned.value;
    const kind = provisioned.value.kind === "granted" ? "access_granted" : "access_restored";
    this.dispatch(userId, async () => ({
      kind,
      displayName: record.displayName,
      link: await this.opts.links.linkFor(record.secret),
    }));
    return provisioned;
  }

  async onLeave(userId: number): Promise<Result<LeaveOutcome, AccessError>> {
    const { stats, logger } = this.opts;
    if (!this.admit(userId)) return ok({ kind: "rate_limited" });

    stats.increment("leaves");
    logger.info(`User ${userId} left the channel`, { leaves: stats.snapshot().leaves });

    return this.exclusive(userId, () => this.revoke(userId));
  }

  private async revoke(userId: number): Promise<Result<LeaveOutcome, AccessError>> {
    const { coordinator, registry, stats, logger } = this.opts;

    const existing = await registry.get(userId);
    if (!existing.ok) return this.registryFailed(userId, existing.error);
    const record = existing.value;
    if (!record || !record.isActive) {
      logger.info(`User ${userId} left without active access`);
      return ok({ kind: "no_active_access" });
    }

    logger.info(`Revoking access for user ${userId}`, { secret: redactSecret(record.secret) });
    const removed = await coordinator.removeSecret(record.secret);
    if (!removed.ok) {
      stats.increment("errors");
      logger.error(`Cannot revoke access for user ${userId}`, {
        reason: formatOperationError(removed.error),
      });
      return err({ kind: "coordinator_failed", error: removed.error });
    }
    if (removed.value.changed) stats.increment("proxiesRemoved");

    const deactivated = await registry.deactivate(userId);
    if (!deactivated.ok) return this.registryFailed(userId, deactivated.error);

    const revoked: UserRecord = { ...record, isActive: false };
    this.dispatch(userId, async () => ({ kind: "access_revoked", displayName: record.displayName }));
    return ok({ kind: "revoked", record: revoked });
  }

  /**
   * Grant access unless the user already has it. Shared by joins and
   * explicit requests; callers apply their own rate gate and notices.
   */
  async provision(
    userId: number,
    displayName: string,
  ): Promise<Result<ProvisionOutcome, AccessError>> {
    return this.exclusive(userId, () => this.grant(userId, displayName));
  }

  private async grant(
    userId: number,
    displayName: string,
  ): Promise<Result<ProvisionOutcome, AccessError>> {
    const { coordinator, registry, stats, logger } = this.opts;

    const existing = await registry.get(userId);
    if (!existing.ok) return this.registryFailed(userId, existing.error);
    if (existing.value?.isActive) {
      logger.info(`User ${userId} already has access`);
      return ok({ kind: "already_active", record: existing.value });
    }

    const secret = this.mintSecret();
    const added = await coordinator.addSecret(secret);
    if (!added.ok) {
      stats.increment("errors");
      logger.error(`Cannot grant access to user ${userId}`, {
        reason: formatOperationError(added.error),
      });
      return err({ kind: "coordinator_failed", error: added.error });
    }
    stats.increment("proxiesCreated");

    const saved = await registry.upsert(userId, displayName, added.value.secret);
    if (!saved.ok) {
      // The secret stays admitted with no owner; status reports it
      logger.error(`Secret admitted but user ${userId} not recorded`, {
        secret: redactSecret(added.value.secret),
      });
      return this.registryFailed(userId, saved.error);
    }

    logger.info(`Granted access to user ${userId}`, { secret: redactSecret(secret) });
    return ok({ kind: "granted", record: saved.value });
  }

  /** Resolves once every notice dispatched so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  // ── Internals ────────────────────────────────────────────────────────

  /**
   * Run one user's check-and-change sequence after any earlier one for the
   * same user has finished. Different users do not wait on each other here.
   */
  private async exclusive<T>(userId: number, task: () => Promise<T>): Promise<T> {
    const previous = this.userTails.get(userId) ?? Promise.resolve();
    const running = previous.then(task);
    const tail = running.then(
      () => undefined,
      () => undefined,
    );
    this.userTails.set(userId, tail);
    try {
      return await running;
    } finally {
      if (this.userTails.get(userId) === tail) this.userTails.delete(userId);
    }
  }

  private admit(userId: number): boolean {
    if (this.opts.limiter.check(userId, this.clock.now()) === "allowed") return true;
    this.opts.stats.increment("rateLimited");
    this.opts.logger.warn(`Rate limited user ${userId}, skipping`);
    return false;
  }

  private registryFailed(userId: number, error: RegistryError): Result<never, AccessError> {
    this.opts.stats.increment("errors");
    this.opts.logger.error(`Registry failure for user ${userId}`, {
      reason: formatRegistryError(error),
    });
    return err({ kind: "registry_failed", error });
  }

  private dispatch(userId: number, compose: () => Promise<Notice>): void {
    const sending = this.send(userId, compose).finally(() => {
      this.pending.delete(sending);
    });
    this.pending.add(sending);
  }

  private async send(userId: number, compose: () => Promise<Notice>): Promise<void> {
    const { notifier, formatNotice, logger } = this.opts;
    try {
      const notice = await compose();
      const sent = await notifier.notify(userId, formatNotice(notice));
      if (sent.ok) {
        logger.info(`Notified user ${userId}`, { notice: notice.kind });
      } else {
        logger.info(`Could not notify user ${userId}`, { reason: sent.error.message });
      }
    } catch (e) {
      logger.warn(`Notice for user ${userId} failed`, { reason: errorMessage(e) });
    }
  }
}
