/**
 * SyncCommand — runs sync and pretty-prints results.
 */

import type { ConsoleOutput } from "../console.js";
import type { SyncOptions } from "../sync.js";
import { sync, formatSyncError } from "../sync.js";
import { formatDriftIssue } from "../status.js";
import { redactSecret } from "../types.js";

export class SyncCommand {
  constructor(
    private opts: SyncOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const result = await sync(this.opts);
    if (!result.ok) {
      this.out.error(formatSyncError(result.error));
      return 1;
    }

    const { before, add, remove, applied, diff } = result.value;
    const unowned = before.issues.filter((i) => i.kind === "unowned_secret");

    this.out.heading(`Channelgate Sync: ${this.opts.store.unitFile}`);
    this.out.write("");

    if (add.length === 0 && remove.length === 0) {
      this.out.success("Nothing to fix.");
      this.reportUnowned(unowned.map(formatDriftIssue));
      return 0;
    }

    if (diff !== null) {
      this.out.write(diff, false);
      this.out.write("");
      this.out.info(`Would admit ${add.length} and evict ${remove.length} secret(s).`);
      return 0;
    }

    this.out.heading("Fixed:");
    for (const s of applied?.added ?? []) this.out.success(`  🔧 admitted ${redactSecret(s)}`);
    for (const s of applied?.removed ?? []) this.out.success(`  🔧 evicted ${redactSecret(s)}`);
    this.out.write("");
    if (applied?.restarted) this.out.success("Daemon restarted.");
    this.reportUnowned(unowned.map(formatDriftIssue));
    return 0;
  }

  private reportUnowned(lines: string[]): void {
    if (lines.length === 0) return;
    this.out.write("");
    this.out.info("Left alone:");
    for (const line of lines) this.out.info(`  ❔ ${line}`);
  }
}
