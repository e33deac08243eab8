import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileCoordinatorLock } from "./coordinator-lock-file.js";
import { NodeSystemOps } from "./system-ops-node.js";
import { MockLogger } from "./logger-mock.js";

const QUICK = { retries: 200, minTimeout: 5, maxTimeout: 10 };

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "channelgate-lock-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function lockIn(root: string, retry = QUICK): FileCoordinatorLock {
  return new FileCoordinatorLock({ ops: new NodeSystemOps(root), logger: new MockLogger(), retry });
}

describe("FileCoordinatorLock", () => {
  test("a second holder waits for the first and sees its restart", async () => {
    const first = await lockIn(dir).acquire();
    if (!first.ok) throw new Error(first.error.message);
    expect(first.value.lastRestartAt).toBeNull();

    let secondTaken = false;
    const second = lockIn(dir)
      .acquire()
      .then((lease) => {
        secondTaken = true;
        return lease;
      });
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(secondTaken).toBe(false);

    await first.value.release(1_767_225_600_000);
    const lease = await second;

    expect(lease.ok && lease.value.lastRestartAt).toBe(1_767_225_600_000);
    if (lease.ok) await lease.value.release(null);
    expect(await readFile(join(dir, "last-restart"), "utf-8")).toBe("1767225600000\n");
  });

  test("fails when the lock stays held", async () => {
    const first = await lockIn(dir).acquire();
    if (!first.ok) throw new Error(first.error.message);

    const second = await lockIn(dir, { retries: 0, minTimeout: 1, maxTimeout: 1 }).acquire();

    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error.kind).toBe("lock_failed");
    await first.value.release(null);
  });

  test("can be taken again after release", async () => {
    const lock = lockIn(dir);
    const first = await lock.acquire();
    if (!first.ok) throw new Error(first.error.message);
    await first.value.release(null);

    const again = await lock.acquire();
    expect(again.ok).toBe(true);
    if (again.ok) await again.value.release(null);
  });

  test("creates a missing state directory", async () => {
    const lease = await lockIn(join(dir, "state")).acquire();

    expect(lease.ok).toBe(true);
    if (lease.ok) await lease.value.release(null);
  });

  test("ignores a malformed stamp", async () => {
    await writeFile(join(dir, "last-restart"), "yesterday\n");
    const logger = new MockLogger();
    const lock = new FileCoordinatorLock({ ops: new NodeSystemOps(dir), logger, retry: QUICK });

    const lease = await lock.acquire();

    expect(lease.ok && lease.value.lastRestartAt).toBeNull();
    expect(logger.messagesAt("warn")).toEqual(["Ignoring a malformed last restart time"]);
    if (lease.ok) await lease.value.release(null);
  });
});
