import { describe, expect, test } from "vitest";
import { createAccessHarness, TEST_PUBLIC_IP } from "./access-mock.js";

const FIRST = "00000000000000000000000000000001";
const SECOND = "00000000000000000000000000000002";
const LINK = (secret: string) =>
  `https://t.me/proxy?server=${TEST_PUBLIC_IP}&port=443&secret=dd${secret}`;

async function secretsOnDisk(h: ReturnType<typeof createAccessHarness>): Promise<string[]> {
  const parsed = await h.store.parse();
  if (!parsed.ok) throw new Error("unit file unreadable");
  return parsed.value.secrets;
}

describe("MembershipReconciler", () => {
  describe("onJoin", () => {
    test("grants a new member a fresh secret", async () => {
      const h = createAccessHarness();

      const result = await h.reconciler.onJoin(42, "alice");
      await h.reconciler.flush();

      expect(result.ok && result.value.kind).toBe("granted");
      expect(await secretsOnDisk(h)).toEqual([FIRST]);
      const record = await h.registry.get(42);
      expect(record.ok && record.value).toMatchObject({ secret: FIRST, isActive: true, displayName: "alice" });
      expect(h.notifier.sent).toEqual([{ userId: 42, text: `access_granted ${LINK(FIRST)}` }]);
      expect(h.stats.snapshot()).toMatchObject({ joins: 1, proxiesCreated: 1 });
    });

    test("a rejoin with active access mints nothing", async () => {
      const h = createAccessHarness();
      await h.reconciler.onJoin(42, "alice");

      const result = await h.reconciler.onJoin(42, "alice");
      await h.reconciler.flush();

      expect(result.ok && result.value.kind).toBe("already_active");
      expect(await secretsOnDisk(h)).toEqual([FIRST]);
      expect(h.daemon.steps()).toEqual(["stop", "reload", "start"]);
      expect(h.notifier.sent.map((m) => m.text)).toEqual([
        `access_granted ${LINK(FIRST)}`,
        `access_restored ${LINK(FIRST)}`,
      ]);
    });

    test("a returning member gets a new secret and keeps createdAt", async () => {
      const h = createAccessHarness();
      await h.reconciler.onJoin(42, "alice");
      h.clock.advance(10_000);
      await h.reconciler.onLeave(42);
      h.clock.advance(10_000);

      const result = await h.reconciler.onJoin(42, "alice");

      expect(result.ok).toBe(true);
      if (!result.ok || result.value.kind === "rate_limited") return;
      expect(result.value.record.secret).toBe(SECOND);
      expect(result.value.record.createdAt).toBe("2026-01-01T00:00:00.000Z");
      expect(await secretsOnDisk(h)).toEqual([SECOND]);
    });

    test("a coordinator failure leaves no record", async () => {
      const h = createAccessHarness();
      h.daemon.fail("start");

      const result = await h.reconciler.onJoin(42, "alice");
      await h.reconciler.flush();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({
        kind: "coordinator_failed",
        error: { kind: "daemon_control_failed", step: "start" },
      });
      expect(await h.registry.get(42)).toEqual({ ok: true, value: null });
      expect(h.notifier.sent).toEqual([]);
      expect(h.stats.snapshot().errors).toBe(1);
    });

    test("a registry failure after admission is reported", async () => {
      const h = createAccessHarness();
      h.registry.failWrites({
        kind: "write_failed",
        error: { kind: "io_error", path: "users.json", message: "disk full" },
      });

      const result = await h.reconciler.onJoin(42, "alice");

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "registry_failed",
          error: {
            kind: "write_failed",
            error: { kind: "io_error", path: "users.json", message: "disk full" },
          },
        },
      });
      expect(await secretsOnDisk(h)).toEqual([FIRST]);
    });
  });

  describe("onLeave", () => {
    test("revokes an active member", async () => {
      const h = createAccessHarness();
      await h.reconciler.onJoin(42, "alice");

      const result = await h.reconciler.onLeave(42);
      await h.reconciler.flush();

      expect(result.ok && result.value.kind).toBe("revoked");
      expect(await secretsOnDisk(h)).toEqual([]);
      const record = await h.registry.get(42);
      expect(record.ok && record.value).toMatchObject({ secret: FIRST, isActive: false });
      expect(h.notifier.sent.map((m) => m.text)).toEqual([
        `access_granted ${LINK(FIRST)}`,
        "access_revoked",
      ]);
      expect(h.stats.snapshot()).toMatchObject({ leaves: 1, proxiesRemoved: 1 });
    });

    test("without an active record nothing happens", async () => {
      const h = createAccessHarness();

      const result = await h.reconciler.onLeave(42);

      expect(result).toEqual({ ok: true, value: { kind: "no_active_access" } });
      expect(h.daemon.calls).toEqual([]);
      expect(h.ops.writes).toEqual([]);
      expect(await h.registry.get(42)).toEqual({ ok: true, value: null });
    });

    test("an inactive record is left alone", async () => {
      const h = createAccessHarness();
      await h.reconciler.onJoin(42, "alice");
      await h.reconciler.onLeave(42);
      const before = await h.registry.get(42);
      const calls = h.daemon.calls.length;

      const result = await h.reconciler.onLeave(42);

      expect(result).toEqual({ ok: true, value: { kind: "no_active_access" } });
      expect(h.daemon.calls).toHaveLength(calls);
      expect(await h.registry.get(42)).toEqual(before);
    });

    test("a coordinator failure keeps the record active", async () => {
      const h = createAccessHarness();
      await h.reconciler.onJoin(42, "alice");
      h.daemon.fail("reload");

      const result = await h.reconciler.onLeave(42);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("coordinator_failed");
      const record = await h.registry.get(42);
      expect(record.ok && record.value?.isActive).toBe(true);
    });
  });

  describe("one user at a time", () => {
    test("a join racing a request admits one secret, and leaving removes it", async () => {
      const h = createAccessHarness();

      const [joined, requested] = await Promise.all([
        h.reconciler.onJoin(42, "alice"),
        h.reconciler.provision(42, "alice"),
      ]);

      expect(joined.ok && joined.value.kind).toBe("granted");
      expect(requested.ok && requested.value.kind).toBe("already_active");
      expect(await secretsOnDisk(h)).toEqual([FIRST]);

      await h.reconciler.onLeave(42);

      expect(await secretsOnDisk(h)).toEqual([]);
    });

    test("a leave racing a join revokes the access the join granted", async () => {
      const h = createAccessHarness();

      const [, left] = await Promise.all([h.reconciler.onJoin(42, "alice"), h.reconciler.onLeave(42)]);

      expect(left.ok && left.value.kind).toBe("revoked");
      expect(await secretsOnDisk(h)).toEqual([]);
      const record = await h.registry.get(42);
      expect(record.ok && record.value?.isActive).toBe(false);
    });

    test("grants for different users both land", async () => {
      const h = createAccessHarness();

      await Promise.all([h.reconciler.onJoin(1, "alice"), h.reconciler.onJoin(2, "bob")]);

      expect(await secretsOnDisk(h)).toEqual([FIRST, SECOND]);
    });
  });

  describe("rate limiting", () => {
    test("drops the sixth event in a minute without any change", async () => {
      const h = createAccessHarness();
      for (let i = 0; i < 5; i++) {
        await h.reconciler.onJoin(42, "alice");
      }
      const calls = h.daemon.calls.length;

      const result = await h.reconciler.onLeave(42);

      expect(result).toEqual({ ok: true, value: { kind: "rate_limited" } });
      expect(h.daemon.calls).toHaveLength(calls);
      const record = await h.registry.get(42);
      expect(record.ok && record.value?.isActive).toBe(true);
      expect(h.stats.snapshot().rateLimited).toBe(1);
    });

    test("other users are not affected", async () => {
      const h = createAccessHarness();
      for (let i = 0; i < 6; i++) await h.reconciler.onLeave(1);

      const result = await h.reconciler.onLeave(2);

      expect(result).toEqual({ ok: true, value: { kind: "no_active_access" } });
    });
  });

  describe("notices", () => {
    test("an unreachable user does not change the outcome", async () => {
      const h = createAccessHarness();
      h.notifier.unreachable.add(42);

      const result = await h.reconciler.onJoin(42, "alice");
      await h.reconciler.flush();

      expect(result.ok && result.value.kind).toBe("granted");
      expect(h.notifier.sent).toEqual([]);
      expect(h.logger.messagesAt("info")).toContain("Could not notify user 42");
    });
  });
});
