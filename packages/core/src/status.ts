/**
 * channelgate status — compare the user registry with the daemon config.
 *
 * Status is the single source of truth for what needs fixing:
 * - missing_secret: an active user's secret is not admitted by the daemon
 * - revoked_secret: an inactive user's secret is still admitted
 * - unowned_secret: an admitted secret no record owns (reported, never fixed;
 *   operators may admit secrets of their own)
 */

import type { ConfigStore, ConfigReadError } from "./config-store.js";
import { formatConfigReadError } from "./config-store.js";
import type { UserRegistry, RegistryError } from "./registry.js";
import { formatRegistryError } from "./registry.js";
import type { DaemonConfig, UserRecord } from "./types.js";
import { redactSecret } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

// ── Types ──────────────────────────────────────────────────────────────

export type DriftIssue =
  | { kind: "missing_secret"; record: UserRecord }
  | { kind: "revoked_secret"; record: UserRecord }
  | { kind: "unowned_secret"; secret: string };

export type StatusResult = {
  /** The daemon config as persisted */
  config: DaemonConfig;
  issues: DriftIssue[];
  activeUsers: number;
};

export type StatusError =
  | { kind: "config_unreadable"; error: ConfigReadError }
  | { kind: "registry_failed"; error: RegistryError };

export type StatusOptions = {
  store: ConfigStore;
  registry: UserRegistry;
};

export function formatStatusError(error: StatusError): string {
  return error.kind === "config_unreadable"
    ? formatConfigReadError(error.error)
    : formatRegistryError(error.error);
}

export function formatDriftIssue(issue: DriftIssue): string {
  switch (issue.kind) {
    case "missing_secret":
      return `user ${issue.record.userId} (${issue.record.displayName}) is active but ${redactSecret(issue.record.secret)} is not admitted`;
    case "revoked_secret":
      return `user ${issue.record.userId} (${issue.record.displayName}) is inactive but ${redactSecret(issue.record.secret)} is still admitted`;
    case "unowned_secret":
      return `${redactSecret(issue.secret)} is admitted but belongs to no user`;
  }
}

// ── Status ─────────────────────────────────────────────────────────────

export async function status(options: StatusOptions): Promise<Result<StatusResult, StatusError>> {
  const { store, registry } = options;

  const config = await store.parse();
  if (!config.ok) return err({ kind: "config_unreadable", error: config.error });

  const records = await registry.list();
  if (!records.ok) return err({ kind: "registry_failed", error: records.error });

  const admitted = new Set(config.value.secrets);
  const active = records.value.filter((r) => r.isActive);
  const activeSecrets = new Set(active.map((r) => r.secret));
  const owned = new Set(records.value.map((r) => r.secret));

  const issues: DriftIssue[] = [];
  for (const record of active) {
    if (!admitted.has(record.secret)) issues.push({ kind: "missing_secret", record });
  }
  for (const record of records.value) {
    if (!record.isActive && admitted.has(record.secret) && !activeSecrets.has(record.secret)) {
      issues.push({ kind: "revoked_secret", record });
    }
  }
  for (const secret of config.value.secrets) {
    if (!owned.has(secret)) issues.push({ kind: "unowned_secret", secret });
  }

  return ok({ config: config.value, issues, activeUsers: active.length });
}
