/**
 * Wires the access layer over in-memory collaborators for tests: a unit
 * file in MockSystemOps, a MockDaemonControl, a MemoryUserRegistry, a fake
 * clock and a canned public address.
 */

import { ConfigStore } from "./config-store.js";
import { ProxyAccessCoordinator } from "./coordinator.js";
import { MembershipReconciler } from "./reconciler.js";
import { AccessService } from "./access.js";
import { ProxyLinks } from "./proxy-links.js";
import { PublicAddress } from "./public-address.js";
import { RateLimiter } from "./rate-limiter.js";
import { AccessStats } from "./stats.js";
import { MockSystemOps } from "./system-ops-mock.js";
import { MockDaemonControl } from "./daemon-control-mock.js";
import { MemoryUserRegistry } from "./registry-mock.js";
import { MockMembershipQuery, MockNotifier } from "./membership-mock.js";
import { MockLogger } from "./logger-mock.js";
import { FakeClock } from "./clock-mock.js";
import type { Notice } from "./membership.js";
import type { DaemonConfig } from "./types.js";
import { DEFAULT_LAUNCH } from "./constants.js";

export const TEST_UNIT_FILE = "MTProxy.service";
export const TEST_PUBLIC_IP = "203.0.113.7";

/** Plain-text notices, easy to assert on */
export function formatTestNotice(notice: Notice): string {
  return notice.kind === "access_revoked" ? notice.kind : `${notice.kind} ${notice.link}`;
}

/** Secrets 000…001, 000…002, … in order */
export function sequentialSecrets(): () => string {
  let n = 0;
  return () => (++n).toString(16).padStart(32, "0");
}

export function createAccessHarness(initial: Partial<DaemonConfig> = {}) {
  const clock = new FakeClock();
  const logger = new MockLogger();
  const ops = new MockSystemOps("/etc/systemd/system");
  const store = new ConfigStore({ ops, unitFile: TEST_UNIT_FILE, launch: DEFAULT_LAUNCH });
  ops.addFile(
    TEST_UNIT_FILE,
    store.render({ port: 443, secrets: [], tag: null, tlsDomain: null, workers: 1, ...initial }),
  );

  const daemon = new MockDaemonControl(clock);
  const coordinator = new ProxyAccessCoordinator({ store, daemon, logger, clock, cooldownSeconds: 5 });
  const registry = new MemoryUserRegistry(clock);
  const membership = new MockMembershipQuery();
  const notifier = new MockNotifier();
  const address = new PublicAddress({
    logger,
    fetch: async () => ({ ok: true, status: 200, text: async () => TEST_PUBLIC_IP }),
  });
  const links = new ProxyLinks(store, address, logger);
  const stats = new AccessStats(clock);

  const reconciler = new MembershipReconciler({
    coordinator,
    registry,
    notifier,
    formatNotice: formatTestNotice,
    links,
    limiter: new RateLimiter(),
    stats,
    logger,
    clock,
    mintSecret: sequentialSecrets(),
  });
  const access = new AccessService({
    reconciler,
    coordinator,
    registry,
    membership,
    links,
    limiter: new RateLimiter(),
    stats,
    logger,
    clock,
  });

  return {
    clock,
    logger,
    ops,
    store,
    daemon,
    coordinator,
    registry,
    membership,
    notifier,
    links,
    stats,
    reconciler,
    access,
  };
}
