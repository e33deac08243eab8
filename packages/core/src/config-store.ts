/**
 * ConfigStore — reads and writes the daemon's unit file.
 *
 * Never caches: every parse() goes back to disk, so each coordinator
 * operation starts from what is actually persisted.
 */

import type { SystemOperations } from "./system-ops.js";
import type { DaemonConfig, FileSystemError, LaunchOptions } from "./types.js";
import { formatFileSystemError } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";
import type { ParseError } from "./daemon-config.js";
import { parseUnitFile, renderUnitFile, formatParseError } from "./daemon-config.js";

export type ConfigReadError =
  | { kind: "read_failed"; error: FileSystemError }
  | { kind: "parse_failed"; error: ParseError };

export type ConfigWriteError = { kind: "write_failed"; error: FileSystemError };

export function formatConfigReadError(error: ConfigReadError): string {
  return error.kind === "read_failed"
    ? `cannot read unit file (${formatFileSystemError(error.error)})`
    : `cannot parse unit file (${formatParseError(error.error)})`;
}

export type ConfigStoreOptions = {
  ops: SystemOperations;
  /** Unit file path, relative to ops.root */
  unitFile: string;
  launch: LaunchOptions;
};

export class ConfigStore {
  private readonly ops: SystemOperations;
  readonly unitFile: string;
  private readonly launch: LaunchOptions;

  constructor(options: ConfigStoreOptions) {
    this.ops = options.ops;
    this.unitFile = options.unitFile;
    this.launch = options.launch;
  }

  /** Raw unit file contents. */
  async read(): Promise<Result<string, ConfigReadError>> {
    const raw = await this.ops.readFile(this.unitFile);
    if (!raw.ok) return err({ kind: "read_failed", error: raw.error });
    return ok(raw.value);
  }

  async parse(): Promise<Result<DaemonConfig, ConfigReadError>> {
    const raw = await this.read();
    if (!raw.ok) return raw;

    const parsed = parseUnitFile(raw.value);
    if (!parsed.ok) return err({ kind: "parse_failed", error: parsed.error });
    return ok(parsed.value);
  }

  /** The unit file text write() would persist for `config`. */
  render(config: DaemonConfig): string {
    return renderUnitFile(config, this.launch);
  }

  async write(config: DaemonConfig): Promise<Result<void, ConfigWriteError>> {
    const result = await this.ops.writeFile(this.unitFile, this.render(config));
    if (!result.ok) return err({ kind: "write_failed", error: result.error });
    return ok(undefined);
  }
}
