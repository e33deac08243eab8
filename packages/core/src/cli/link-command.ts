/**
 * LinkCommand — prints a user's proxy link.
 */

import type { ConsoleOutput } from "../console.js";
import type { UserRegistry } from "../registry.js";
import { formatRegistryError } from "../registry.js";
import type { ProxyLinks } from "../proxy-links.js";

export type LinkCommandOptions = {
  registry: UserRegistry;
  links: ProxyLinks;
  userId: number;
};

export class LinkCommand {
  constructor(
    private opts: LinkCommandOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const { registry, links, userId } = this.opts;

    const record = await registry.get(userId);
    if (!record.ok) {
      this.out.error(formatRegistryError(record.error));
      return 1;
    }
    if (!record.value?.isActive) {
      this.out.error(`User ${userId} has no active access.`);
      return 1;
    }

    this.out.write(await links.linkFor(record.value.secret));
    return 0;
  }
}
