/**
 * Proxy links — the `https://t.me/proxy` URI a client opens to connect.
 *
 * With a fake-TLS domain the secret is sent as `ee<secret><hex(domain)>`,
 * otherwise as `dd<secret>` (random padding).
 */

import type { DaemonConfig } from "./types.js";
import { LINK_BASE } from "./constants.js";

export function encodeClientSecret(secret: string, tlsDomain: string | null): string {
  if (tlsDomain) {
    return `ee${secret}${Buffer.from(tlsDomain, "utf8").toString("hex")}`;
  }
  return `dd${secret}`;
}

export function buildLink(
  secret: string,
  config: Pick<DaemonConfig, "port" | "tlsDomain">,
  publicIp: string,
): string {
  const client = encodeClientSecret(secret.toLowerCase(), config.tlsDomain);
  return `${LINK_BASE}?server=${publicIp}&port=${config.port}&secret=${client}`;
}
