/**
 * UserRegistry — one record per chat user who was ever granted access.
 *
 * Records are deactivated, never deleted; the secret and createdAt survive
 * revocation. Callers write here only after the coordinator succeeded.
 *
 * JsonUserRegistry keeps the document in memory and persists it whole to
 * a JSON file on every change.
 */

import type { SystemOperations } from "./system-ops.js";
import type { FileSystemError, UserRecord } from "./types.js";
import { formatFileSystemError } from "./types.js";
import type { Result } from "./result.js";
import { ok, err, errorMessage } from "./result.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import { registryDocumentSchema } from "./schema.js";
import type { RegistryDocument } from "./schema.js";

// ── Types ──────────────────────────────────────────────────────────────

export type RegistryError =
  | { kind: "read_failed"; error: FileSystemError }
  | { kind: "parse_failed"; message: string }
  | { kind: "write_failed"; error: FileSystemError };

export function formatRegistryError(error: RegistryError): string {
  switch (error.kind) {
    case "read_failed":
      return `cannot read user registry (${formatFileSystemError(error.error)})`;
    case "parse_failed":
      return `cannot parse user registry (${error.message})`;
    case "write_failed":
      return `cannot write user registry (${formatFileSystemError(error.error)})`;
  }
}

export interface UserRegistry {
  get(userId: number): Promise<Result<UserRecord | null, RegistryError>>;

  /**
   * Create or reactivate the user's record with `secret`. createdAt is kept
   * when the record already exists.
   */
  upsert(userId: number, displayName: string, secret: string): Promise<Result<UserRecord, RegistryError>>;

  /** Mark the record inactive. Returns false when there was no active record. */
  deactivate(userId: number): Promise<Result<boolean, RegistryError>>;

  listActive(): Promise<Result<UserRecord[], RegistryError>>;

  /** Every record, active or not, ordered by user id */
  list(): Promise<Result<UserRecord[], RegistryError>>;
}

// ── Shared record transitions ──────────────────────────────────────────

export function grantedRecord(
  existing: UserRecord | undefined,
  userId: number,
  displayName: string,
  secret: string,
  now: string,
): UserRecord {
  return {
    userId,
    displayName,
    secret,
    isActive: true,
    createdAt: existing?.createdAt ?? now,
    updatedAt: now,
  };
}

export function byUserId(a: UserRecord, b: UserRecord): number {
  return a.userId - b.userId;
}

// ── JSON file registry ─────────────────────────────────────────────────

export class JsonUserRegistry implements UserRegistry {
  private users: Map<number, UserRecord>;
  private writeTail: Promise<unknown> = Promise.resolve();

  private constructor(
    private ops: SystemOperations,
    private path: string,
    private clock: Clock,
    users: UserRecord[],
  ) {
    this.users = new Map(users.map((u) => [u.userId, u]));
  }

  /** Load the registry from disk. A missing file is an empty registry. */
  static async load(
    ops: SystemOperations,
    path: string,
    clock: Clock = systemClock,
  ): Promise<Result<JsonUserRegistry, RegistryError>> {
    const exists = await ops.exists(path);
    if (!exists.ok) return err({ kind: "read_failed", error: exists.error });
    if (!exists.value) return ok(new JsonUserRegistry(ops, path, clock, []));

    const raw = await ops.readFile(path);
    if (!raw.ok) return err({ kind: "read_failed", error: raw.error });

    try {
      const doc = registryDocumentSchema.parse(JSON.parse(raw.value));
      return ok(new JsonUserRegistry(ops, path, clock, Object.values(doc.users)));
    } catch (e) {
      return err({ kind: "parse_failed", message: errorMessage(e) });
    }
  }

  async get(userId: number): Promise<Result<UserRecord | null, RegistryError>> {
    const record = this.users.get(userId);
    return ok(record ? { ...record } : null);
  }

  async upsert(
    userId: number,
    displayName: string,
    secret: string,
  ): Promise<Result<UserRecord, RegistryError>> {
    return this.commit(() => {
      const now = new Date(this.clock.now()).toISOString();
      const record = grantedRecord(this.users.get(userId), userId, displayName, secret, now);
      return { record, result: { ...record } };
    });
  }

  async deactivate(userId: number): Promise<Result<boolean, RegistryError>> {
    return this.commit(() => {
      const existing = this.users.get(userId);
      if (!existing || !existing.isActive) return { result: false };
      const now = new Date(this.clock.now()).toISOString();
      return { record: { ...existing, isActive: false, updatedAt: now }, result: true };
    });
  }

  async listActive(): Promise<Result<UserRecord[], RegistryError>> {
    return ok(
      [...this.users.values()]
        .filter((u) => u.isActive)
        .map((u) => ({ ...u }))
        .sort(byUserId),
    );
  }

  async list(): Promise<Result<UserRecord[], RegistryError>> {
    return ok([...this.users.values()].map((u) => ({ ...u })).sort(byUserId));
  }

  /**
   * Persist one record change. The in-memory map changes only after the
   * file was written, so a failed write leaves the registry as it was.
   */
  private async commit<T>(
    change: () => { record?: UserRecord; result: T },
  ): Promise<Result<T, RegistryError>> {
    const task = this.writeTail.then(async (): Promise<Result<T, RegistryError>> => {
      const { record, result } = change();
      if (!record) return ok(result);

      const next = new Map(this.users);
      next.set(record.userId, record);
      const written = await this.ops.writeFile(this.path, serialize(next));
      if (!written.ok) return err({ kind: "write_failed", error: written.error });

      this.users = next;
      return ok(result);
    });
    this.writeTail = task.catch(() => undefined);
    return task;
  }
}

function serialize(users: Map<number, UserRecord>): string {
  const doc: RegistryDocument = { version: 1, users: {} };
  for (const record of [...users.values()].sort(byUserId)) {
    doc.users[String(record.userId)] = record;
  }
  return JSON.stringify(doc, null, 2) + "\n";
}
