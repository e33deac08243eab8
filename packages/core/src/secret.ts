/**
 * Secrets — 16 random bytes, hex encoded.
 */

import { randomBytes } from "node:crypto";

const HEX_TOKEN = /^[0-9a-f]{32}$/i;

/** True when `value` has the shape of a secret or tag (32 hex chars, any case). */
export function isHexToken(value: string): boolean {
  return HEX_TOKEN.test(value);
}

/** Mint a fresh secret. */
export function generateSecret(): string {
  return randomBytes(16).toString("hex");
}
