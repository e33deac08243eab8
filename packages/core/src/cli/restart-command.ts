/**
 * RestartCommand — restarts the daemon through the coordinator. It waits
 * for the coordinator lock the bot holds while changing the daemon, and
 * honours the restart cooldown recorded under that lock.
 */

import type { ConsoleOutput } from "../console.js";
import type { ProxyAccessCoordinator } from "../coordinator.js";
import { formatOperationError } from "../coordinator.js";

export type RestartCommandOptions = {
  coordinator: ProxyAccessCoordinator;
};

export class RestartCommand {
  constructor(
    private opts: RestartCommandOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const result = await this.opts.coordinator.restartDaemon();
    if (!result.ok) {
      this.out.error(`Restart failed: ${formatOperationError(result.error)}`);
      return 1;
    }
    this.out.success(`Daemon restarted at ${new Date(result.value.at).toISOString()}.`);
    return 0;
  }
}
