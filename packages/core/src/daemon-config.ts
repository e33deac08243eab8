/**
 * Unit file format — the only code that knows how DaemonConfig is
 * encoded in the daemon's systemd unit.
 *
 * The configuration lives on the `ExecStart=` line:
 *   <binary> -u <user> -H <port> [-S <secret>]... [-P <tag>] -D <domain> -M <workers> <extra args>
 *
 * `-D ""` means fake-TLS is switched off (written for a null or empty domain);
 * a missing `-D` means the default domain.
 */

import type { DaemonConfig, LaunchOptions } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";
import { DAEMON_DEFAULTS } from "./constants.js";
import { isHexToken } from "./secret.js";

export type ParseError =
  | { kind: "missing_exec_start" }
  | { kind: "missing_value"; flag: string }
  | { kind: "invalid_value"; flag: string; value: string };

export function formatParseError(error: ParseError): string {
  switch (error.kind) {
    case "missing_exec_start":
      return "no ExecStart= line";
    case "missing_value":
      return `${error.flag} has no value`;
    case "invalid_value":
      return `invalid value for ${error.flag}: ${JSON.stringify(error.value)}`;
  }
}

const EXEC_START = /^ExecStart=(.*)$/m;
const DISABLED_DOMAIN = '""';
const HOSTNAME = /^[A-Za-z0-9](?:[A-Za-z0-9.-]*[A-Za-z0-9])?$/;
const DIGITS = /^\d+$/;

const KNOWN_FLAGS = new Set(["-H", "-S", "-P", "-D", "-M"]);

/**
 * Parse a unit file into a DaemonConfig.
 *
 * Fails on the first malformed value rather than returning a partial config.
 */
export function parseUnitFile(text: string): Result<DaemonConfig, ParseError> {
  const match = EXEC_START.exec(text);
  if (!match?.[1]?.trim()) return err({ kind: "missing_exec_start" });

  const tokens = match[1].trim().split(/\s+/);
  const config: DaemonConfig = {
    port: DAEMON_DEFAULTS.port,
    secrets: [],
    tag: null,
    tlsDomain: DAEMON_DEFAULTS.tlsDomain,
    workers: DAEMON_DEFAULTS.workers,
  };
  const seen = new Set<string>();

  for (let i = 0; i < tokens.length; i++) {
    const flag = tokens[i];
    if (flag === undefined || !KNOWN_FLAGS.has(flag)) continue;

    const value = tokens[i + 1];
    if (value === undefined || value.startsWith("-")) {
      return err({ kind: "missing_value", flag });
    }
    i++;

    switch (flag) {
      case "-H": {
        const port = DIGITS.test(value) ? Number(value) : NaN;
        if (!(port >= 1 && port <= 65535)) return err({ kind: "invalid_value", flag, value });
        config.port = port;
        break;
      }
      case "-S": {
        if (!isHexToken(value)) return err({ kind: "invalid_value", flag, value });
        const secret = value.toLowerCase();
        if (!seen.has(secret)) {
          seen.add(secret);
          config.secrets.push(secret);
        }
        break;
      }
      case "-P": {
        if (!isHexToken(value)) return err({ kind: "invalid_value", flag, value });
        config.tag = value.toLowerCase();
        break;
      }
      case "-D": {
        if (value === DISABLED_DOMAIN) {
          config.tlsDomain = null;
        } else if (HOSTNAME.test(value)) {
          config.tlsDomain = value;
        } else {
          return err({ kind: "invalid_value", flag, value });
        }
        break;
      }
      case "-M": {
        const workers = DIGITS.test(value) ? Number(value) : NaN;
        if (!(workers >= 1)) return err({ kind: "invalid_value", flag, value });
        config.workers = workers;
        break;
      }
    }
  }

  return ok(config);
}

/** Build the ExecStart command line for a config. */
export function renderExecStart(config: DaemonConfig, launch: LaunchOptions): string {
  const args = [launch.binary, "-u", launch.runAs, "-H", String(config.port)];
  for (const secret of config.secrets) args.push("-S", secret);
  if (config.tag) args.push("-P", config.tag);
  args.push("-D", config.tlsDomain || DISABLED_DOMAIN);
  args.push("-M", String(config.workers));
  args.push(...launch.extraArgs);
  return args.join(" ");
}

/** Render the complete unit file. Same input, same bytes. */
export function renderUnitFile(config: DaemonConfig, launch: LaunchOptions): string {
  return [
    "[Unit]",
    "Description=MTProxy",
    "After=network.target",
    "",
    "[Service]",
    "Type=simple",
    `WorkingDirectory=${launch.workingDirectory}`,
    `ExecStart=${renderExecStart(config, launch)}`,
    "Restart=on-failure",
    "StartLimitBurst=0",
    "",
    "[Install]",
    "WantedBy=multi-user.target",
    "",
  ].join("\n");
}
