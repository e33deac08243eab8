/**
 * AccessService — the request path: what a user or admin asks for directly,
 * as opposed to what the reconciler does on membership changes.
 *
 * Membership is checked first and a failed check is an error, never a
 * grant. Requests draw on their own rate limiter, separate from the
 * reconciler's.
 */

import type { ProxyAccessCoordinator, Restarted } from "./coordinator.js";
import type { MembershipReconciler } from "./reconciler.js";
import type { UserRegistry } from "./registry.js";
import type { MembershipQuery } from "./membership.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { ProxyLinks } from "./proxy-links.js";
import type { AccessStats, StatsSnapshot } from "./stats.js";
import type { AccessError } from "./access-error.js";
import { formatAccessError } from "./access-error.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { Logger } from "./logger.js";
import type { UserRecord } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

export type RequestOutcome =
  | { kind: "granted" | "already_active"; record: UserRecord; link: string }
  | { kind: "rate_limited" };

export type AccessReport = StatsSnapshot & {
  activeUsers: number;
  lastRestartAt: number | null;
};

export type AccessServiceOptions = {
  reconciler: MembershipReconciler;
  coordinator: ProxyAccessCoordinator;
  registry: UserRegistry;
  membership: MembershipQuery;
  links: ProxyLinks;
  limiter: RateLimiter;
  stats: AccessStats;
  logger: Logger;
  clock?: Clock;
};

export class AccessService {
  private readonly opts: AccessServiceOptions;
  private readonly clock: Clock;

  constructor(options: AccessServiceOptions) {
    this.opts = options;
    this.clock = options.clock ?? systemClock;
  }

  /** A user asks for a proxy. */
  async requestAccess(
    userId: number,
    displayName: string,
  ): Promise<Result<RequestOutcome, AccessError>> {
    const { membership, limiter, reconciler, links, stats, logger } = this.opts;

    const member = await membership.isMember(userId);
    if (!member.ok) {
      logger.error(`Cannot check membership of user ${userId}`, { reason: member.error.message });
      return err({ kind: "membership_unknown", error: member.error });
    }
    if (!member.value) return err({ kind: "not_member" });

    if (limiter.check(userId, this.clock.now()) === "limited") {
      stats.increment("rateLimited");
      logger.warn(`Rate limited request from user ${userId}`);
      return ok({ kind: "rate_limited" });
    }

    const provisioned = await reconciler.provision(userId, displayName);
    if (!provisioned.ok) return provisioned;

    const { kind, record } = provisioned.value;
    return ok({ kind, record, link: await links.linkFor(record.secret) });
  }

  /** The user's link, or null without active access. */
  async getLink(userId: number): Promise<Result<string | null, AccessError>> {
    const record = await this.describeAccess(userId);
    if (!record.ok) return record;
    if (!record.value?.isActive) return ok(null);
    return ok(await this.opts.links.linkFor(record.value.secret));
  }

  /** The user's record, active or not. */
  async describeAccess(userId: number): Promise<Result<UserRecord | null, AccessError>> {
    const record = await this.opts.registry.get(userId);
    if (!record.ok) return err({ kind: "registry_failed", error: record.error });
    return ok(record.value);
  }

  /** An admin restarts the daemon. */
  async restartProxy(adminUserId: number): Promise<Result<Restarted, AccessError>> {
    const { coordinator, logger } = this.opts;

    const admin = await this.requireAdmin(adminUserId);
    if (!admin.ok) return admin;

    const restarted = await coordinator.restartDaemon();
    if (!restarted.ok) {
      const error: AccessError = { kind: "coordinator_failed", error: restarted.error };
      this.opts.stats.increment("errors");
      logger.error(`Restart by admin ${adminUserId} failed`, { reason: formatAccessError(error) });
      return err(error);
    }
    logger.info(`Daemon restarted by admin ${adminUserId}`);
    return restarted;
  }

  /** Counters plus registry and daemon state, for admins. */
  async stats(adminUserId: number): Promise<Result<AccessReport, AccessError>> {
    const admin = await this.requireAdmin(adminUserId);
    if (!admin.ok) return admin;

    const active = await this.opts.registry.listActive();
    if (!active.ok) return err({ kind: "registry_failed", error: active.error });

    return ok({
      ...this.opts.stats.snapshot(),
      activeUsers: active.value.length,
      lastRestartAt: this.opts.coordinator.lastRestartAt(),
    });
  }

  private async requireAdmin(userId: number): Promise<Result<void, AccessError>> {
    const admin = await this.opts.membership.isAdmin(userId);
    if (!admin.ok) {
      this.opts.logger.error(`Cannot check admin status of user ${userId}`, {
        reason: admin.error.message,
      });
      return err({ kind: "membership_unknown", error: admin.error });
    }
    if (!admin.value) return err({ kind: "not_admin" });
    return ok(undefined);
  }
}
