/**
 * channelgate schemas — runtime validation via Zod.
 *
 * The canonical types are Settings and UserRecord in types.ts; the schemas
 * are checked against them at compile time via z.ZodType<T>.
 */

import { z } from "zod";
import type { Settings, UserRecord } from "./types.js";
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_COOLDOWN_SECONDS,
  DEFAULT_LAUNCH,
  DEFAULT_PUBLIC_ADDRESS,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_RATE_LIMIT,
  DEFAULT_REGISTRY_FILE,
  DEFAULT_SERVICE_NAME,
  DEFAULT_UNIT_FILE,
} from "./constants.js";

const hexToken = z.string().regex(/^[0-9a-f]{32}$/, "expected 32 lowercase hex characters");

// ── Settings ───────────────────────────────────────────────────────────

const daemonSchema = z
  .object({
    unitFile: z.string().min(1).default(DEFAULT_UNIT_FILE),
    serviceName: z.string().min(1).default(DEFAULT_SERVICE_NAME),
    binary: z.string().min(1).default(DEFAULT_LAUNCH.binary),
    workingDirectory: z.string().min(1).default(DEFAULT_LAUNCH.workingDirectory),
    runAs: z.string().min(1).default(DEFAULT_LAUNCH.runAs),
    extraArgs: z.array(z.string()).default([...DEFAULT_LAUNCH.extraArgs]),
    commandTimeoutMs: z.number().int().positive().default(DEFAULT_COMMAND_TIMEOUT_MS),
  })
  .default({});

export const settingsSchema: z.ZodType<Settings, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(1),
  channel: z.string().min(1),
  daemon: daemonSchema,
  registryFile: z.string().min(1).default(DEFAULT_REGISTRY_FILE),
  cooldownSeconds: z.number().nonnegative().default(DEFAULT_COOLDOWN_SECONDS),
  queueCapacity: z.number().int().positive().default(DEFAULT_QUEUE_CAPACITY),
  rateLimit: z
    .object({
      maxActions: z.number().int().positive().default(DEFAULT_RATE_LIMIT.maxActions),
      windowSeconds: z.number().positive().default(DEFAULT_RATE_LIMIT.windowSeconds),
    })
    .default({}),
  publicAddress: z
    .object({
      lookupUrl: z.string().url().default(DEFAULT_PUBLIC_ADDRESS.lookupUrl),
      fallback: z.string().ip().default(DEFAULT_PUBLIC_ADDRESS.fallback),
      timeoutMs: z.number().int().positive().default(DEFAULT_PUBLIC_ADDRESS.timeoutMs),
    })
    .default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/**
 * Parse and validate a channelgate.json object.
 */
export function parseSettings(raw: unknown): Settings {
  return settingsSchema.parse(raw);
}

// ── Registry document ──────────────────────────────────────────────────

export type RegistryDocument = {
  version: 1;
  /** Keyed by the decimal user id */
  users: Record<string, UserRecord>;
};

export const userRecordSchema: z.ZodType<UserRecord> = z.object({
  userId: z.number().int(),
  displayName: z.string(),
  secret: hexToken,
  isActive: z.boolean(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export const registryDocumentSchema: z.ZodType<RegistryDocument> = z.object({
  version: z.literal(1),
  users: z.record(z.string(), userRecordSchema),
});
