/**
 * ProxyLinks — builds a user's link from the daemon's current config and
 * the host's public address.
 *
 * Reads the unit file without taking the coordinator's lock, so a read
 * racing a write may see either version. When the file cannot be read the
 * daemon defaults stand in.
 */

import type { ConfigStore } from "./config-store.js";
import { formatConfigReadError } from "./config-store.js";
import type { PublicAddress } from "./public-address.js";
import type { Logger } from "./logger.js";
import type { DaemonConfig } from "./types.js";
import { buildLink } from "./link.js";
import { DAEMON_DEFAULTS } from "./constants.js";

export class ProxyLinks {
  constructor(
    private store: ConfigStore,
    private address: PublicAddress,
    private logger: Logger,
  ) {}

  async linkFor(secret: string): Promise<string> {
    const [config, ip] = await Promise.all([this.currentConfig(), this.address.lookup()]);
    return buildLink(secret, config, ip);
  }

  private async currentConfig(): Promise<Pick<DaemonConfig, "port" | "tlsDomain">> {
    const parsed = await this.store.parse();
    if (parsed.ok) return parsed.value;
    this.logger.warn("Building link from daemon defaults", {
      reason: formatConfigReadError(parsed.error),
    });
    return { port: DAEMON_DEFAULTS.port, tlsDomain: DAEMON_DEFAULTS.tlsDomain };
  }
}
