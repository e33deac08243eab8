/**
 * StatusCommand — pretty-prints the result of `status()`.
 * Like `git status`: only shows problems, not users that are in order.
 */

import type { ConsoleOutput } from "../console.js";
import type { StatusOptions, DriftIssue } from "../status.js";
import { status, formatDriftIssue, formatStatusError } from "../status.js";

export class StatusCommand {
  constructor(
    private opts: StatusOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const result = await status(this.opts);
    if (!result.ok) {
      this.out.error(formatStatusError(result.error));
      return 1;
    }

    const { config, issues, activeUsers } = result.value;

    this.out.heading(`Channelgate Status: ${this.opts.store.unitFile}`);
    this.out.info(`${config.secrets.length} secret(s) admitted, ${activeUsers} active user(s)`);
    this.out.write("");

    if (issues.length === 0) {
      this.out.success("Registry and daemon agree.");
      return 0;
    }

    for (const issue of issues) {
      this.printIssue(issue);
    }
    this.out.write("");

    const count = (kind: DriftIssue["kind"]) => issues.filter((i) => i.kind === kind).length;
    this.out.info(
      `${count("missing_secret")} missing, ${count("revoked_secret")} revoked, ${count("unowned_secret")} unowned`,
    );
    return 1;
  }

  private printIssue(issue: DriftIssue): void {
    switch (issue.kind) {
      case "missing_secret":
        this.out.error(`  ❌ ${formatDriftIssue(issue)}`);
        break;
      case "revoked_secret":
        this.out.warn(`  ⚠️  ${formatDriftIssue(issue)}`);
        break;
      case "unowned_secret":
        this.out.info(`  ❔ ${formatDriftIssue(issue)}`);
        break;
    }
  }
}
