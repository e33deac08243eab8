import { describe, expect, test } from "vitest";
import { sync } from "./sync.js";
import { createAccessHarness } from "./access-mock.js";
import type { UserRecord } from "./types.js";

const A = "a".repeat(32);
const B = "b".repeat(32);
const C = "c".repeat(32);

function record(userId: number, secret: string, isActive: boolean): UserRecord {
  return {
    userId,
    displayName: `user${userId}`,
    secret,
    isActive,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
  };
}

async function secretsOnDisk(h: ReturnType<typeof createAccessHarness>): Promise<string[]> {
  const parsed = await h.store.parse();
  if (!parsed.ok) throw new Error("unit file unreadable");
  return parsed.value.secrets;
}

describe("sync", () => {
  test("re-admits missing and evicts revoked secrets with one restart", async () => {
    const h = createAccessHarness({ secrets: [B, C] });
    h.registry.seed(record(1, A, true));
    h.registry.seed(record(2, B, false));

    const result = await sync(h);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.add).toEqual([A]);
    expect(result.value.remove).toEqual([B]);
    expect(result.value.applied?.restarted).toBe(true);
    expect(await secretsOnDisk(h)).toEqual([C, A]);
    expect(h.daemon.steps()).toEqual(["stop", "reload", "start"]);
  });

  test("does nothing when there is nothing to fix", async () => {
    const h = createAccessHarness({ secrets: [A, C] });
    h.registry.seed(record(1, A, true));

    const result = await sync(h);

    expect(result.ok && result.value.applied).toBeNull();
    expect(h.daemon.calls).toEqual([]);
    expect(h.ops.writes).toEqual([]);
  });

  test("a dry run shows the unit file diff and changes nothing", async () => {
    const h = createAccessHarness({ secrets: [B] });
    h.registry.seed(record(1, A, true));
    h.registry.seed(record(2, B, false));

    const result = await sync({ ...h, dryRun: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.applied).toBeNull();
    const lines = (result.value.diff ?? "").split("\n");
    expect(lines.some((l) => l.startsWith("--- a/MTProxy.service"))).toBe(true);
    expect(lines.some((l) => l.startsWith("+++ b/MTProxy.service"))).toBe(true);
    expect(lines.filter((l) => l.startsWith("-ExecStart="))).toHaveLength(1);
    expect(lines.find((l) => l.startsWith("-ExecStart="))).toContain(`-S ${B}`);
    expect(lines.find((l) => l.startsWith("+ExecStart="))).toContain(`-S ${A}`);
    expect(await secretsOnDisk(h)).toEqual([B]);
    expect(h.daemon.calls).toEqual([]);
  });

  test("reports a coordinator failure", async () => {
    const h = createAccessHarness();
    h.registry.seed(record(1, A, true));
    h.daemon.fail("start");

    const result = await sync(h);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({
      kind: "coordinator_failed",
      error: { kind: "daemon_control_failed", step: "start", configWritten: true },
    });
  });
});
