/**
 * UsersCommand — lists registry records, active ones by default.
 */

import type { ConsoleOutput } from "../console.js";
import type { UserRegistry } from "../registry.js";
import { formatRegistryError } from "../registry.js";
import { redactSecret } from "../types.js";
import type { UserRecord } from "../types.js";

export type UsersCommandOptions = {
  registry: UserRegistry;
  /** Include deactivated records */
  all?: boolean;
};

export function formatUserRow(user: UserRecord): string {
  return [
    String(user.userId).padEnd(12),
    (user.isActive ? "active" : "inactive").padEnd(9),
    redactSecret(user.secret).padEnd(12),
    user.createdAt.slice(0, 10),
    user.displayName,
  ].join(" ");
}

export class UsersCommand {
  constructor(
    private opts: UsersCommandOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const { registry, all = false } = this.opts;

    const users = all ? await registry.list() : await registry.listActive();
    if (!users.ok) {
      this.out.error(formatRegistryError(users.error));
      return 1;
    }

    if (users.value.length === 0) {
      this.out.info(all ? "No users." : "No active users.");
      return 0;
    }

    this.out.heading(`${users.value.length} ${all ? "user(s)" : "active user(s)"}`);
    for (const user of users.value) {
      this.out.write(formatUserRow(user));
    }
    return 0;
  }
}
