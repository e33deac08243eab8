/**
 * Shared constants for channelgate.
 */

import type { LaunchOptions } from "./types.js";

/** Field defaults applied when the unit file omits a flag */
export const DAEMON_DEFAULTS = {
  port: 8888,
  tlsDomain: "www.cloudflare.com",
  workers: 1,
} as const;

export const DEFAULT_LAUNCH: LaunchOptions = {
  binary: "/opt/MTProxy/objs/bin/mtproto-proxy",
  workingDirectory: "/opt/MTProxy/objs/bin",
  runAs: "nobody",
  extraArgs: ["--aes-pwd", "proxy-secret", "proxy-multi.conf"],
};

export const DEFAULT_UNIT_FILE = "/etc/systemd/system/MTProxy.service";
export const DEFAULT_SERVICE_NAME = "MTProxy";
export const DEFAULT_REGISTRY_FILE = "/var/lib/channelgate/users.json";

/** Seconds between daemon restarts */
export const DEFAULT_COOLDOWN_SECONDS = 5;
/** Coordinator operations allowed in flight, the running one included */
export const DEFAULT_QUEUE_CAPACITY = 50;

export const DEFAULT_RATE_LIMIT = { maxActions: 5, windowSeconds: 60 } as const;

export const DEFAULT_PUBLIC_ADDRESS = {
  lookupUrl: "https://api.ipify.org",
  fallback: "127.0.0.1",
  timeoutMs: 10_000,
} as const;

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export const LINK_BASE = "https://t.me/proxy";

export const DEFAULT_SETTINGS_PATH = "/etc/channelgate/channelgate.json";

/** In the registry's directory, shared by every channelgate process */
export const COORDINATOR_LOCK_DIR = "coordinator.lock";
export const RESTART_STAMP_FILE = "last-restart";
