import { describe, expect, test } from "vitest";
import { PublicAddress } from "./public-address.js";
import type { FetchLike } from "./public-address.js";
import { MockLogger } from "./logger-mock.js";

function respond(body: string, status = 200): FetchLike {
  return async () => ({ ok: status < 400, status, text: async () => body });
}

describe("PublicAddress", () => {
  test("returns the looked-up address and caches it", async () => {
    let calls = 0;
    const fetch: FetchLike = async (url, init) => {
      calls++;
      return respond("203.0.113.7\n")(url, init);
    };
    const address = new PublicAddress({ logger: new MockLogger(), fetch });

    expect(await address.lookup()).toBe("203.0.113.7");
    expect(await address.lookup()).toBe("203.0.113.7");
    expect(calls).toBe(1);
  });

  test("falls back on an HTTP error", async () => {
    const logger = new MockLogger();
    const address = new PublicAddress({ logger, fallback: "192.0.2.1", fetch: respond("", 503) });

    expect(await address.lookup()).toBe("192.0.2.1");
    expect(logger.messagesAt("warn")).toEqual(["Public address lookup failed, using 192.0.2.1"]);
    expect(logger.entries[0]?.fields?.["reason"]).toBe("lookup failed (503)");
  });

  test("falls back when the body is not an address", async () => {
    const address = new PublicAddress({ logger: new MockLogger(), fetch: respond("<html>") });
    expect(await address.lookup()).toBe("127.0.0.1");
  });

  test("falls back when the request throws and retries next time", async () => {
    let attempt = 0;
    const fetch: FetchLike = async () => {
      attempt++;
      if (attempt === 1) throw new Error("network down");
      return { ok: true, status: 200, text: async () => "198.51.100.2" };
    };
    const address = new PublicAddress({ logger: new MockLogger(), fetch });

    expect(await address.lookup()).toBe("127.0.0.1");
    expect(await address.lookup()).toBe("198.51.100.2");
  });

  test("passes the configured URL", async () => {
    const urls: string[] = [];
    const fetch: FetchLike = async (url) => {
      urls.push(url);
      return { ok: true, status: 200, text: async () => "198.51.100.2" };
    };
    await new PublicAddress({ logger: new MockLogger(), fetch, lookupUrl: "http://ip.test/" }).lookup();
    expect(urls).toEqual(["http://ip.test/"]);
  });
});
