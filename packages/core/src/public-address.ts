/**
 * PublicAddress — the host's public IP, as advertised in proxy links.
 *
 * Looked up over HTTP on first use. Any failure yields the configured
 * fallback and is retried on the next call; a successful lookup is kept
 * for the life of the process.
 */

import { isIP } from "node:net";
import type { Logger } from "./logger.js";
import { errorMessage } from "./result.js";
import { DEFAULT_PUBLIC_ADDRESS } from "./constants.js";

export type HttpResponseLike = {
  ok: boolean;
  status: number;
  text(): Promise<string>;
};

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<HttpResponseLike>;

export type PublicAddressOptions = {
  lookupUrl?: string;
  fallback?: string;
  timeoutMs?: number;
  logger: Logger;
  fetch?: FetchLike;
};

export class PublicAddress {
  private readonly lookupUrl: string;
  private readonly fallback: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetch: FetchLike;
  private cached: string | null = null;

  constructor(options: PublicAddressOptions) {
    this.lookupUrl = options.lookupUrl ?? DEFAULT_PUBLIC_ADDRESS.lookupUrl;
    this.fallback = options.fallback ?? DEFAULT_PUBLIC_ADDRESS.fallback;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PUBLIC_ADDRESS.timeoutMs;
    this.logger = options.logger;
    this.fetch = options.fetch ?? fetch;
  }

  async lookup(): Promise<string> {
    if (this.cached !== null) return this.cached;

    try {
      const res = await this.fetch(this.lookupUrl, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) throw new Error(`lookup failed (${res.status})`);
      const address = (await res.text()).trim();
      if (isIP(address) === 0) throw new Error(`not an IP address: ${JSON.stringify(address)}`);
      this.cached = address;
      return address;
    } catch (e) {
      this.logger.warn(`Public address lookup failed, using ${this.fallback}`, {
        url: this.lookupUrl,
        reason: errorMessage(e),
      });
      return this.fallback;
    }
  }
}
