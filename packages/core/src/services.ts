/**
 * Service wiring — builds the coordinator and its collaborators from
 * settings. The CLI and the bot both start here, so both take the same
 * coordinator lock in the registry's directory.
 */

import { dirname, basename } from "node:path";
import { NodeSystemOps } from "./system-ops-node.js";
import { ConfigStore } from "./config-store.js";
import { SystemdDaemonControl } from "./daemon-control-systemd.js";
import { ProxyAccessCoordinator } from "./coordinator.js";
import { FileCoordinatorLock } from "./coordinator-lock-file.js";
import { JsonUserRegistry } from "./registry.js";
import type { RegistryError, UserRegistry } from "./registry.js";
import { PublicAddress } from "./public-address.js";
import { ProxyLinks } from "./proxy-links.js";
import { MembershipReconciler } from "./reconciler.js";
import { AccessService } from "./access.js";
import { RateLimiter } from "./rate-limiter.js";
import { AccessStats } from "./stats.js";
import type { MembershipQuery, NoticeFormatter, Notifier } from "./membership.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { Logger } from "./logger.js";
import type { Settings } from "./types.js";
import type { Result } from "./result.js";
import { ok } from "./result.js";

export type CoreServices = {
  settings: Settings;
  logger: Logger;
  clock: Clock;
  store: ConfigStore;
  coordinator: ProxyAccessCoordinator;
  registry: UserRegistry;
  links: ProxyLinks;
};

export type AccessLayer = {
  reconciler: MembershipReconciler;
  access: AccessService;
  stats: AccessStats;
};

export type TransportHooks = {
  membership: MembershipQuery;
  notifier: Notifier;
  formatNotice: NoticeFormatter;
};

export async function openServices(
  settings: Settings,
  logger: Logger,
  clock: Clock = systemClock,
): Promise<Result<CoreServices, RegistryError>> {
  const { daemon } = settings;

  const store = new ConfigStore({
    ops: new NodeSystemOps(dirname(daemon.unitFile)),
    unitFile: basename(daemon.unitFile),
    launch: {
      binary: daemon.binary,
      workingDirectory: daemon.workingDirectory,
      runAs: daemon.runAs,
      extraArgs: daemon.extraArgs,
    },
  });

  const stateOps = new NodeSystemOps(dirname(settings.registryFile));

  const coordinator = new ProxyAccessCoordinator({
    store,
    daemon: new SystemdDaemonControl({
      service: daemon.serviceName,
      timeoutMs: daemon.commandTimeoutMs,
    }),
    logger,
    clock,
    cooldownSeconds: settings.cooldownSeconds,
    queueCapacity: settings.queueCapacity,
    lock: new FileCoordinatorLock({ ops: stateOps, logger }),
  });

  const registry = await JsonUserRegistry.load(stateOps, basename(settings.registryFile), clock);
  if (!registry.ok) return registry;

  const address = new PublicAddress({ ...settings.publicAddress, logger });
  const links = new ProxyLinks(store, address, logger);

  return ok({ settings, logger, clock, store, coordinator, registry: registry.value, links });
}

/** The reconciler and request path, each with its own rate limiter. */
export function createAccessLayer(core: CoreServices, hooks: TransportHooks): AccessLayer {
  const { settings, logger, clock, coordinator, registry, links } = core;
  const stats = new AccessStats(clock);

  const reconciler = new MembershipReconciler({
    coordinator,
    registry,
    notifier: hooks.notifier,
    formatNotice: hooks.formatNotice,
    links,
    limiter: new RateLimiter(settings.rateLimit),
    stats,
    logger,
    clock,
  });

  const access = new AccessService({
    reconciler,
    coordinator,
    registry,
    membership: hooks.membership,
    links,
    limiter: new RateLimiter(settings.rateLimit),
    stats,
    logger,
    clock,
  });

  return { reconciler, access, stats };
}
