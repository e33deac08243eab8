import { describe, expect, test } from "vitest";
import { ProxyAccessCoordinator, formatOperationError } from "./coordinator.js";
import { ConfigStore } from "./config-store.js";
import { MockSystemOps } from "./system-ops-mock.js";
import { MockDaemonControl } from "./daemon-control-mock.js";
import { MockLogger } from "./logger-mock.js";
import { FakeClock } from "./clock-mock.js";
import { MockCoordinatorLock } from "./coordinator-lock-mock.js";
import type { CoordinatorLock } from "./coordinator-lock.js";
import { DEFAULT_LAUNCH } from "./constants.js";
import type { DaemonConfig } from "./types.js";

const UNIT = "MTProxy.service";
const S1 = "a".repeat(32);
const S2 = "b".repeat(32);
const S3 = "c".repeat(32);

function secretFor(n: number): string {
  return n.toString(16).padStart(32, "0");
}

function setup(
  initial: Partial<DaemonConfig> | null = {},
  opts: { cooldownSeconds?: number; queueCapacity?: number; lock?: CoordinatorLock } = {},
) {
  const clock = new FakeClock();
  const ops = new MockSystemOps("/etc/systemd/system");
  const store = new ConfigStore({ ops, unitFile: UNIT, launch: DEFAULT_LAUNCH });
  if (initial) {
    const config: DaemonConfig = {
      port: 443,
      secrets: [],
      tag: null,
      tlsDomain: "example.com",
      workers: 1,
      ...initial,
    };
    ops.addFile(UNIT, store.render(config));
  }
  const daemon = new MockDaemonControl(clock);
  const logger = new MockLogger();
  const coordinator = new ProxyAccessCoordinator({
    store,
    daemon,
    logger,
    clock,
    cooldownSeconds: opts.cooldownSeconds ?? 5,
    queueCapacity: opts.queueCapacity,
    lock: opts.lock,
  });
  return { clock, ops, store, daemon, logger, coordinator };
}

async function secretsOnDisk(store: ConfigStore): Promise<string[]> {
  const parsed = await store.parse();
  if (!parsed.ok) throw new Error("unit file unreadable");
  return parsed.value.secrets;
}

describe("ProxyAccessCoordinator", () => {
  describe("addSecret", () => {
    test("admits a new secret and restarts the daemon", async () => {
      const { clock, store, daemon, coordinator } = setup({ secrets: [S1] });

      const result = await coordinator.addSecret(S2);

      expect(result).toEqual({ ok: true, value: { secret: S2, changed: true } });
      expect(await secretsOnDisk(store)).toEqual([S1, S2]);
      expect(daemon.steps()).toEqual(["stop", "reload", "start"]);
      expect(coordinator.lastRestartAt()).toBe(clock.now());
    });

    test("is idempotent: a second add succeeds without restarting", async () => {
      const { store, daemon, coordinator } = setup();

      const first = await coordinator.addSecret(S1);
      const second = await coordinator.addSecret(S1);

      expect(first).toEqual({ ok: true, value: { secret: S1, changed: true } });
      expect(second).toEqual({ ok: true, value: { secret: S1, changed: false } });
      expect(await secretsOnDisk(store)).toEqual([S1]);
      expect(daemon.steps()).toEqual(["stop", "reload", "start"]);
    });

    test("normalizes an uppercase secret", async () => {
      const { store, coordinator } = setup();

      const result = await coordinator.addSecret(S1.toUpperCase());

      expect(result).toEqual({ ok: true, value: { secret: S1, changed: true } });
      expect(await secretsOnDisk(store)).toEqual([S1]);
    });

    test("rejects a malformed secret before touching anything", async () => {
      const { ops, daemon, coordinator } = setup();

      const result = await coordinator.addSecret("xyz");

      expect(result).toEqual({ ok: false, error: { kind: "invalid_secret", secret: "xyz" } });
      expect(ops.writes).toHaveLength(0);
      expect(daemon.calls).toHaveLength(0);
    });
  });

  describe("removeSecret", () => {
    test("evicts an admitted secret and restarts the daemon", async () => {
      const { store, daemon, coordinator } = setup({ secrets: [S1, S2] });

      const result = await coordinator.removeSecret(S1);

      expect(result).toEqual({ ok: true, value: { secret: S1, changed: true } });
      expect(await secretsOnDisk(store)).toEqual([S2]);
      expect(daemon.steps()).toEqual(["stop", "reload", "start"]);
    });

    test("does not touch the daemon when the secret is absent", async () => {
      const { ops, daemon, coordinator } = setup({ secrets: [S2] });

      const result = await coordinator.removeSecret(S1);

      expect(result).toEqual({ ok: true, value: { secret: S1, changed: false } });
      expect(daemon.calls).toHaveLength(0);
      expect(ops.writes).toHaveLength(0);
    });
  });

  describe("cooldown", () => {
    test("holds back the second restart until the cooldown has passed", async () => {
      const { clock, daemon, coordinator } = setup();

      const [a, b] = await Promise.all([coordinator.addSecret(S1), coordinator.addSecret(S2)]);
      expect(a.ok && b.ok).toBe(true);

      const firstRestart = daemon.calls[2];
      const secondStop = daemon.calls[3];
      expect(firstRestart?.step).toBe("start");
      expect(secondStop?.step).toBe("stop");
      expect((secondStop?.at ?? 0) - (firstRestart?.at ?? 0)).toBeGreaterThanOrEqual(5_000);
      expect(clock.sleeps).toEqual([5_000]);
    });

    test("does not wait once the cooldown has elapsed", async () => {
      const { clock, coordinator } = setup();

      await coordinator.addSecret(S1);
      clock.advance(6_000);
      await coordinator.addSecret(S2);

      expect(clock.sleeps).toEqual([]);
    });

    test("waits only for the remainder", async () => {
      const { clock, coordinator } = setup();

      await coordinator.addSecret(S1);
      clock.advance(3_500);
      await coordinator.addSecret(S2);

      expect(clock.sleeps).toEqual([1_500]);
    });
  });

  describe("failures", () => {
    test("reports an unreadable config without touching the daemon", async () => {
      const { daemon, coordinator } = setup(null);

      const result = await coordinator.addSecret(S1);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "config_unreadable",
          error: { kind: "read_failed", error: { kind: "not_found", path: UNIT } },
        },
      });
      expect(daemon.calls).toHaveLength(0);
    });

    test("reports a unit file without ExecStart as unreadable", async () => {
      const { ops, daemon, coordinator } = setup(null);
      ops.addFile(UNIT, "[Unit]\nDescription=MTProxy\n");

      const result = await coordinator.removeSecret(S1);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("config_unreadable");
      expect(daemon.calls).toHaveLength(0);
    });

    test("aborts before daemon control when the write fails", async () => {
      const { ops, daemon, coordinator } = setup();
      ops.failWrites(UNIT, { kind: "io_error", path: UNIT, message: "disk full" });

      const result = await coordinator.addSecret(S1);

      expect(result).toEqual({
        ok: false,
        error: { kind: "write_failed", error: { kind: "io_error", path: UNIT, message: "disk full" } },
      });
      expect(daemon.calls).toHaveLength(0);
      expect(coordinator.lastRestartAt()).toBeNull();
    });

    test("tolerates a failed stop", async () => {
      const { daemon, logger, coordinator } = setup();
      daemon.fail("stop");

      const result = await coordinator.addSecret(S1);

      expect(result).toEqual({ ok: true, value: { secret: S1, changed: true } });
      expect(daemon.steps()).toEqual(["stop", "reload", "start"]);
      expect(logger.messagesAt("warn")).toEqual(["Stopping MTProxy failed, continuing"]);
    });

    test("reports a failed start and leaves the config written", async () => {
      const { store, daemon, coordinator } = setup();
      daemon.fail("start");

      const result = await coordinator.addSecret(S1);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "daemon_control_failed",
          step: "start",
          message: "start failed",
          configWritten: true,
        },
      });
      expect(await secretsOnDisk(store)).toEqual([S1]);
      expect(coordinator.lastRestartAt()).toBeNull();
    });

    test("reports a failed reload without starting", async () => {
      const { daemon, coordinator } = setup();
      daemon.fail("reload");

      const result = await coordinator.removeSecret(S1);
      expect(result.ok).toBe(true); // absent: no-op

      const added = await coordinator.addSecret(S1);
      expect(added.ok).toBe(false);
      if (added.ok) return;
      expect(added.error).toMatchObject({ kind: "daemon_control_failed", step: "reload" });
      expect(daemon.steps()).toEqual(["stop", "reload"]);
    });

    test("keeps serving after a failed operation", async () => {
      const { store, daemon, coordinator } = setup();
      daemon.fail("start");
      await coordinator.addSecret(S1);
      daemon.heal("start");

      const result = await coordinator.addSecret(S2);

      expect(result).toEqual({ ok: true, value: { secret: S2, changed: true } });
      expect(await secretsOnDisk(store)).toEqual([S1, S2]);
    });
  });

  describe("concurrency", () => {
    test("serializes concurrent adds without losing any", async () => {
      const { store, coordinator } = setup({ secrets: [S3] });
      const secrets = Array.from({ length: 20 }, (_, i) => secretFor(i + 1));

      const results = await Promise.all(secrets.map((s) => coordinator.addSecret(s)));

      expect(results.every((r) => r.ok)).toBe(true);
      const onDisk = await secretsOnDisk(store);
      expect(onDisk).toHaveLength(21);
      expect(new Set(onDisk)).toEqual(new Set([S3, ...secrets]));
    });

    test("sheds operations beyond the queue capacity", async () => {
      const { coordinator } = setup({}, { queueCapacity: 1 });

      const first = coordinator.addSecret(S1);
      const second = await coordinator.addSecret(S2);

      expect(second).toEqual({ ok: false, error: { kind: "queue_full", capacity: 1 } });
      expect(coordinator.pending()).toBe(1);
      expect((await first).ok).toBe(true);
      expect(coordinator.pending()).toBe(0);
    });
  });

  describe("apply", () => {
    test("applies a batch with a single restart", async () => {
      const { store, daemon, coordinator } = setup({ secrets: [S1] });

      const result = await coordinator.apply({ add: [S2, S3], remove: [S1] });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.added).toEqual([S2, S3]);
      expect(result.value.removed).toEqual([S1]);
      expect(result.value.restarted).toBe(true);
      expect(await secretsOnDisk(store)).toEqual([S2, S3]);
      expect(daemon.steps()).toEqual(["stop", "reload", "start"]);
    });

    test("an empty batch is a no-op", async () => {
      const { daemon, coordinator } = setup({ secrets: [S1] });

      const result = await coordinator.apply({});

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.restarted).toBe(false);
      expect(result.value.config.secrets).toEqual([S1]);
      expect(daemon.calls).toHaveLength(0);
    });
  });

  describe("restartDaemon", () => {
    test("stops, starts and checks the daemon", async () => {
      const { clock, daemon, coordinator } = setup();

      const result = await coordinator.restartDaemon();

      expect(result).toEqual({ ok: true, value: { at: clock.now() } });
      expect(daemon.steps()).toEqual(["stop", "start", "is-active"]);
      expect(coordinator.lastRestartAt()).toBe(clock.now());
    });

    test("reports a daemon that does not stay up", async () => {
      const { daemon, coordinator } = setup();
      daemon.crashOnStart = true;

      const result = await coordinator.restartDaemon();

      expect(result).toEqual({ ok: false, error: { kind: "daemon_not_active" } });
    });

    test("respects the cooldown after a mutation", async () => {
      const { clock, coordinator } = setup();

      await coordinator.addSecret(S1);
      await coordinator.restartDaemon();

      expect(clock.sleeps).toEqual([5_000]);
    });
  });

  describe("shared lock", () => {
    const START = Date.UTC(2026, 0, 1);

    test("a restart recorded by another process holds back the next one", async () => {
      const lock = new MockCoordinatorLock();
      lock.lastRestartAt = START - 2_000;
      const { clock, coordinator } = setup({}, { lock });

      const result = await coordinator.addSecret(S1);

      expect(result.ok).toBe(true);
      expect(clock.sleeps).toEqual([3_000]);
      expect(lock.releases).toEqual([coordinator.lastRestartAt()]);
      expect(lock.held).toBe(false);
    });

    test("a sequence without a restart records nothing on release", async () => {
      const lock = new MockCoordinatorLock();
      const { coordinator } = setup({ secrets: [S1] }, { lock });

      await coordinator.addSecret(S1);

      expect(lock.acquired).toBe(1);
      expect(lock.releases).toEqual([null]);
    });

    test("a lock that cannot be taken fails before touching anything", async () => {
      const lock = new MockCoordinatorLock();
      lock.failure = "Lock file is already being held";
      const { ops, daemon, coordinator } = setup({}, { lock });

      const result = await coordinator.addSecret(S1);

      expect(result).toEqual({
        ok: false,
        error: { kind: "lock_failed", message: "Lock file is already being held" },
      });
      expect(daemon.calls).toEqual([]);
      expect(ops.writes).toHaveLength(0);
    });

    test("the lock is released after a failed sequence", async () => {
      const lock = new MockCoordinatorLock();
      const { daemon, coordinator } = setup({}, { lock });
      daemon.fail("start");

      const result = await coordinator.restartDaemon();

      expect(result.ok).toBe(false);
      expect(lock.held).toBe(false);
      expect(lock.releases).toEqual([null]);
    });
  });

  describe("formatOperationError", () => {
    test("explains a lock failure", () => {
      expect(formatOperationError({ kind: "lock_failed", message: "timed out" })).toBe(
        "cannot take the coordinator lock: timed out",
      );
    });

    test("explains a failure after the config was written", () => {
      expect(
        formatOperationError({
          kind: "daemon_control_failed",
          step: "start",
          message: "exit 1",
          configWritten: true,
        }),
      ).toBe("daemon start failed after the unit file was updated: exit 1");
    });

    test("explains a full queue", () => {
      expect(formatOperationError({ kind: "queue_full", capacity: 50 })).toBe(
        "too many pending operations (capacity 50)",
      );
    });
  });
});
