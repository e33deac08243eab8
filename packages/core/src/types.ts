/**
 * channelgate core types
 *
 * The daemon's configuration, the user registry row, and the file-system
 * error shapes every collaborator shares.
 */

import type { LogLevel } from "./logger.js";

// ── Daemon configuration ──────────────────────────────────────────────

/** The proxy daemon's launch configuration, as encoded in its unit file. */
export type DaemonConfig = {
  /** Client-facing port (`-H`) */
  port: number;
  /** Admitted secrets (`-S`), lowercase 32-char hex, unique, in file order */
  secrets: string[];
  /** Advertising tag (`-P`), or null when not set */
  tag: string | null;
  /** Fake-TLS domain (`-D`), or null when explicitly disabled */
  tlsDomain: string | null;
  /** Worker processes (`-M`) */
  workers: number;
};

/** How the daemon binary is launched; everything in ExecStart that isn't DaemonConfig. */
export type LaunchOptions = {
  binary: string;
  workingDirectory: string;
  runAs: string;
  extraArgs: string[];
};

// ── Users ─────────────────────────────────────────────────────────────

export type UserRecord = {
  userId: number;
  displayName: string;
  /** The user's secret; kept after deactivation for history */
  secret: string;
  isActive: boolean;
  createdAt: string; // ISO-8601
  updatedAt: string; // ISO-8601
};

// ── File system errors ────────────────────────────────────────────────

export type NotFoundError = { kind: "not_found"; path: string };
export type PermissionDeniedError = { kind: "permission_denied"; path: string; operation: string };
export type IOError = { kind: "io_error"; path: string; message: string };

export type FileSystemError = NotFoundError | PermissionDeniedError | IOError;

export function formatFileSystemError(error: FileSystemError): string {
  switch (error.kind) {
    case "not_found":
      return `${error.path}: not found`;
    case "permission_denied":
      return `${error.path}: permission denied (${error.operation})`;
    case "io_error":
      return `${error.path}: ${error.message}`;
  }
}

/** Secrets never appear in full in logs or CLI output. */
export function redactSecret(secret: string): string {
  return `${secret.slice(0, 8)}...`;
}

// ── Settings ──────────────────────────────────────────────────────────

/** channelgate.json, with defaults applied */
export type Settings = {
  version: 1;
  /** Channel whose members get access: `@name` or a numeric chat id */
  channel: string;
  daemon: {
    unitFile: string;
    serviceName: string;
    binary: string;
    workingDirectory: string;
    runAs: string;
    extraArgs: string[];
    commandTimeoutMs: number;
  };
  registryFile: string;
  cooldownSeconds: number;
  queueCapacity: number;
  rateLimit: { maxActions: number; windowSeconds: number };
  publicAddress: { lookupUrl: string; fallback: string; timeoutMs: number };
  logLevel: LogLevel;
};
