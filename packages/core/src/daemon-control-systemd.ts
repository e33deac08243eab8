/**
 * SystemdDaemonControl — drives the daemon's unit through `systemctl`.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { DaemonControl, DaemonControlError, DaemonStep } from "./daemon-control.js";
import type { Result } from "./result.js";
import { ok, err, errorMessage } from "./result.js";
import { DEFAULT_COMMAND_TIMEOUT_MS } from "./constants.js";

const execFileAsync = promisify(execFile);

export type SystemdDaemonControlOptions = {
  service: string;
  /** Kill a systemctl call that runs longer than this */
  timeoutMs?: number;
  /** systemctl binary, overridable for tests */
  systemctl?: string;
};

export class SystemdDaemonControl implements DaemonControl {
  readonly service: string;
  private readonly timeoutMs: number;
  private readonly systemctl: string;

  constructor(options: SystemdDaemonControlOptions) {
    this.service = options.service;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.systemctl = options.systemctl ?? "systemctl";
  }

  private async run(
    step: DaemonStep,
    args: string[],
  ): Promise<Result<string, DaemonControlError>> {
    try {
      const { stdout } = await execFileAsync(this.systemctl, args, { timeout: this.timeoutMs });
      return ok(stdout);
    } catch (e) {
      const stderr =
        e instanceof Error && "stderr" in e && typeof e.stderr === "string" ? e.stderr.trim() : "";
      return err({ kind: "command_failed", step, message: stderr || errorMessage(e) });
    }
  }

  async stop(): Promise<Result<void, DaemonControlError>> {
    const result = await this.run("stop", ["stop", this.service]);
    return result.ok ? ok(undefined) : result;
  }

  async reloadManager(): Promise<Result<void, DaemonControlError>> {
    const result = await this.run("reload", ["daemon-reload"]);
    return result.ok ? ok(undefined) : result;
  }

  async start(): Promise<Result<void, DaemonControlError>> {
    const result = await this.run("start", ["start", this.service]);
    return result.ok ? ok(undefined) : result;
  }

  async isActive(): Promise<Result<boolean, DaemonControlError>> {
    try {
      const { stdout } = await execFileAsync(this.systemctl, ["is-active", this.service], {
        timeout: this.timeoutMs,
      });
      return ok(stdout.trim() === "active");
    } catch (e) {
      // is-active exits non-zero for inactive/failed units and prints the state
      if (e instanceof Error && "code" in e && typeof e.code === "number") {
        return ok(false);
      }
      return err({ kind: "command_failed", step: "is-active", message: errorMessage(e) });
    }
  }
}
