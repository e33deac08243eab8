#!/usr/bin/env node
/**
 * channelgate CLI entry point.
 */

import { Command, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { LiveConsoleOutput } from "./console-live.js";
import { LiveLogger } from "./logger-live.js";
import { StatusCommand } from "./cli/status-command.js";
import { SyncCommand } from "./cli/sync-command.js";
import { LinkCommand } from "./cli/link-command.js";
import { UsersCommand } from "./cli/users-command.js";
import { RestartCommand } from "./cli/restart-command.js";
import { loadSettings } from "./settings.js";
import { openServices } from "./services.js";
import type { CoreServices } from "./services.js";
import { formatRegistryError } from "./registry.js";
import type { ConsoleOutput } from "./console.js";
import { errorMessage } from "./result.js";
import { DEFAULT_SETTINGS_PATH } from "./constants.js";

type ConfigOption = { config: string };

async function makeServices(configPath: string): Promise<CoreServices> {
  const settings = await loadSettings(configPath);
  const logger = new LiveLogger(settings.logLevel);
  const services = await openServices(settings, logger);
  if (!services.ok) throw new Error(formatRegistryError(services.error));
  return services.value;
}

/** Run a command, turning any thrown startup error into exit code 1. */
async function run(
  configPath: string,
  build: (services: CoreServices, out: ConsoleOutput) => { execute(): Promise<number> },
): Promise<void> {
  const out = new LiveConsoleOutput();
  try {
    const services = await makeServices(configPath);
    process.exitCode = await build(services, out).execute();
  } catch (e) {
    out.error(errorMessage(e));
    process.exitCode = 1;
  }
}

function parseUserId(value: string): number {
  if (!/^-?\d+$/.test(value)) throw new InvalidArgumentError("Not a numeric user id.");
  return Number(value);
}

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // Not beside the sources (a bundled or compiled install)
  }
  return "0.0.0";
}

const configFlag = ["-c, --config <path>", "settings file", process.env.CHANNELGATE_CONFIG ?? DEFAULT_SETTINGS_PATH] as const;

const program = new Command()
  .name("channelgate")
  .description("Channel-membership access control for an MTProto proxy")
  .version(getVersion());

program
  .command("status")
  .description("Compare the user registry with the daemon's admitted secrets")
  .option(...configFlag)
  .action(async (opts: ConfigOption) => {
    await run(opts.config, (s, out) => new StatusCommand(s, out));
  });

program
  .command("sync")
  .description("Re-admit missing secrets and evict revoked ones")
  .option(...configFlag)
  .option("--dry-run", "show the unit file diff without applying it")
  .action(async (opts: ConfigOption & { dryRun?: boolean }) => {
    await run(opts.config, (s, out) => new SyncCommand({ ...s, dryRun: opts.dryRun ?? false }, out));
  });

program
  .command("link")
  .description("Print a user's proxy link")
  .argument("<userId>", "chat user id", parseUserId)
  .option(...configFlag)
  .action(async (userId: number, opts: ConfigOption) => {
    await run(opts.config, (s, out) => new LinkCommand({ registry: s.registry, links: s.links, userId }, out));
  });

program
  .command("users")
  .description("List users with access")
  .option(...configFlag)
  .option("--all", "include users whose access was revoked")
  .action(async (opts: ConfigOption & { all?: boolean }) => {
    await run(opts.config, (s, out) => new UsersCommand({ registry: s.registry, all: opts.all ?? false }, out));
  });

program
  .command("restart")
  .description("Restart the proxy daemon, respecting the restart cooldown")
  .option(...configFlag)
  .action(async (opts: ConfigOption) => {
    await run(opts.config, (s, out) => new RestartCommand({ coordinator: s.coordinator }, out));
  });

await program.parseAsync();
