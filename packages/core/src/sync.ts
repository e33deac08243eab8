/**
 * channelgate sync — fix the issues found by status.
 *
 * Status detects, sync fixes. Missing secrets are re-admitted and revoked
 * ones evicted in a single coordinator batch, so the daemon restarts at
 * most once. Unowned secrets are left alone.
 */

import { createTwoFilesPatch } from "diff";
import type { ProxyAccessCoordinator, Applied, OperationError } from "./coordinator.js";
import { nextSecrets, formatOperationError } from "./coordinator.js";
import { status, formatStatusError } from "./status.js";
import type { StatusOptions, StatusResult, StatusError } from "./status.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

export type SyncResult = {
  before: StatusResult;
  /** Secrets to admit */
  add: string[];
  /** Secrets to evict */
  remove: string[];
  /** What the coordinator did; null for a dry run or when nothing needed fixing */
  applied: Applied | null;
  /** Unified diff of the unit file; only for a dry run with changes */
  diff: string | null;
};

export type SyncError = StatusError | { kind: "coordinator_failed"; error: OperationError };

export type SyncOptions = StatusOptions & {
  coordinator: ProxyAccessCoordinator;
  /** Report what would change without changing it */
  dryRun?: boolean;
};

export function formatSyncError(error: SyncError): string {
  return error.kind === "coordinator_failed"
    ? formatOperationError(error.error)
    : formatStatusError(error);
}

export async function sync(options: SyncOptions): Promise<Result<SyncResult, SyncError>> {
  const { store, coordinator, dryRun = false } = options;

  const beforeResult = await status(options);
  if (!beforeResult.ok) return beforeResult;
  const before = beforeResult.value;

  const add: string[] = [];
  const remove: string[] = [];
  for (const issue of before.issues) {
    if (issue.kind === "missing_secret") add.push(issue.record.secret);
    else if (issue.kind === "revoked_secret") remove.push(issue.record.secret);
  }

  const result: SyncResult = { before, add, remove, applied: null, diff: null };
  if (add.length === 0 && remove.length === 0) return ok(result);

  if (dryRun) {
    const after = { ...before.config, secrets: nextSecrets(before.config.secrets, add, remove) };
    result.diff = createTwoFilesPatch(
      `a/${store.unitFile}`,
      `b/${store.unitFile}`,
      store.render(before.config),
      store.render(after),
    );
    return ok(result);
  }

  const applied = await coordinator.apply({ add, remove });
  if (!applied.ok) return err({ kind: "coordinator_failed", error: applied.error });
  result.applied = applied.value;
  return ok(result);
}
