/**
 * DaemonControl — lifecycle of the proxy daemon's system service.
 *
 * Every operation is idempotent and may fail. Callers decide which
 * failures matter: stop() is best-effort, reloadManager() and start() are not.
 */

import type { Result } from "./result.js";

export type DaemonStep = "stop" | "reload" | "start" | "is-active";

export type DaemonControlError = {
  kind: "command_failed";
  step: DaemonStep;
  message: string;
};

export interface DaemonControl {
  /** Service name, for messages */
  readonly service: string;

  stop(): Promise<Result<void, DaemonControlError>>;

  /** Make the service manager re-read unit definitions */
  reloadManager(): Promise<Result<void, DaemonControlError>>;

  start(): Promise<Result<void, DaemonControlError>>;

  /** Whether the service manager reports the daemon as running */
  isActive(): Promise<Result<boolean, DaemonControlError>>;
}
