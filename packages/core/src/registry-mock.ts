/**
 * MemoryUserRegistry — in-memory UserRegistry for tests, with failure
 * injection on writes.
 */

import type { UserRegistry, RegistryError } from "./registry.js";
import { grantedRecord, byUserId } from "./registry.js";
import type { UserRecord } from "./types.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

export class MemoryUserRegistry implements UserRegistry {
  private users: Map<number, UserRecord> = new Map();
  private failure: RegistryError | null = null;

  constructor(private clock: Clock = systemClock) {}

  /** Seed a record directly */
  seed(record: UserRecord): void {
    this.users.set(record.userId, record);
  }

  /** Fail every write with `error` until cleared */
  failWrites(error: RegistryError | null): void {
    this.failure = error;
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
    if (this.failure) return err(this.failure);
    const now = new Date(this.clock.now()).toISOString();
    const record = grantedRecord(this.users.get(userId), userId, displayName, secret, now);
    this.users.set(userId, record);
    return ok({ ...record });
  }

  async deactivate(userId: number): Promise<Result<boolean, RegistryError>> {
    if (this.failure) return err(this.failure);
    const existing = this.users.get(userId);
    if (!existing || !existing.isActive) return ok(false);
    const now = new Date(this.clock.now()).toISOString();
    this.users.set(userId, { ...existing, isActive: false, updatedAt: now });
    return ok(true);
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
}
