// Shared primitives
export type {
  DaemonConfig,
  LaunchOptions,
  UserRecord,
  Settings,
  // Errors
  FileSystemError,
  NotFoundError,
  PermissionDeniedError,
  IOError,
} from "./types.js";
export { formatFileSystemError, redactSecret } from "./types.js";

// Result (generic pattern)
export type { Result } from "./result.js";
export { ok, err, errorMessage } from "./result.js";

// Settings
export { settingsSchema, parseSettings, registryDocumentSchema } from "./schema.js";
export type { RegistryDocument } from "./schema.js";
export { loadSettings, SETTINGS_FILE } from "./settings.js";
export * from "./constants.js";

// System operations
export type { SystemOperations } from "./system-ops.js";
export { NodeSystemOps } from "./system-ops-node.js";
export { MockSystemOps } from "./system-ops-mock.js";
export type { RecordedWrite } from "./system-ops-mock.js";

// Logging and time
export type { Logger, LogLevel, LogFields } from "./logger.js";
export { LiveLogger } from "./logger-live.js";
export { MockLogger } from "./logger-mock.js";
export type { CapturedEntry } from "./logger-mock.js";
export type { Clock } from "./clock.js";
export { systemClock } from "./clock.js";
export { FakeClock } from "./clock-mock.js";

// Daemon config and control
export { parseUnitFile, renderUnitFile, renderExecStart, formatParseError } from "./daemon-config.js";
export type { ParseError } from "./daemon-config.js";
export { ConfigStore, formatConfigReadError } from "./config-store.js";
export type { ConfigReadError, ConfigWriteError, ConfigStoreOptions } from "./config-store.js";
export type { DaemonControl, DaemonControlError, DaemonStep } from "./daemon-control.js";
export { SystemdDaemonControl } from "./daemon-control-systemd.js";
export { MockDaemonControl } from "./daemon-control-mock.js";

// Coordination
export { timeUntilReady } from "./cooldown.js";
export { SerialQueue } from "./serial-queue.js";
export type { QueueFullError } from "./serial-queue.js";
export { ProxyAccessCoordinator, formatOperationError, nextSecrets } from "./coordinator.js";
export type {
  OperationError,
  OperationPhase,
  SecretChanges,
  Applied,
  Admitted,
  Removed,
  Restarted,
  CoordinatorOptions,
} from "./coordinator.js";
export { processLocalLock } from "./coordinator-lock.js";
export type { CoordinatorLock, LockLease, LockError } from "./coordinator-lock.js";
export { FileCoordinatorLock } from "./coordinator-lock-file.js";
export type { FileCoordinatorLockOptions, LockRetryPolicy } from "./coordinator-lock-file.js";
export { MockCoordinatorLock } from "./coordinator-lock-mock.js";
export { RateLimiter } from "./rate-limiter.js";
export type { RateDecision, RateLimitPolicy } from "./rate-limiter.js";
export { isHexToken, generateSecret } from "./secret.js";

// Links
export { buildLink, encodeClientSecret } from "./link.js";
export { PublicAddress } from "./public-address.js";
export type { FetchLike, PublicAddressOptions } from "./public-address.js";
export { ProxyLinks } from "./proxy-links.js";

// Users and access
export type { UserRegistry, RegistryError } from "./registry.js";
export { JsonUserRegistry, formatRegistryError } from "./registry.js";
export { MemoryUserRegistry } from "./registry-mock.js";
export type {
  MembershipQuery,
  MembershipError,
  Notifier,
  NotifyError,
  Notice,
  NoticeFormatter,
} from "./membership.js";
export { MockMembershipQuery, MockNotifier } from "./membership-mock.js";
export type { SentMessage } from "./membership-mock.js";
export type { AccessError } from "./access-error.js";
export { formatAccessError } from "./access-error.js";
export { AccessStats } from "./stats.js";
export type { StatsCounter, StatsSnapshot } from "./stats.js";
export { MembershipReconciler } from "./reconciler.js";
export type { JoinOutcome, LeaveOutcome, ProvisionOutcome, ReconcilerOptions } from "./reconciler.js";
export { AccessService } from "./access.js";
export type { RequestOutcome, AccessReport, AccessServiceOptions } from "./access.js";
export {
  createAccessHarness,
  formatTestNotice,
  sequentialSecrets,
  TEST_PUBLIC_IP,
  TEST_UNIT_FILE,
} from "./access-mock.js";

// Wiring
export { openServices, createAccessLayer } from "./services.js";
export type { CoreServices, AccessLayer, TransportHooks } from "./services.js";

// Status and sync
export { status, formatDriftIssue, formatStatusError } from "./status.js";
export type { DriftIssue, StatusResult, StatusError, StatusOptions } from "./status.js";
export { sync, formatSyncError } from "./sync.js";
export type { SyncResult, SyncError, SyncOptions } from "./sync.js";

// Console output
export type { ConsoleOutput } from "./console.js";
export { LiveConsoleOutput } from "./console-live.js";
export { MockConsoleOutput } from "./console-mock.js";

// CLI commands
export { StatusCommand } from "./cli/status-command.js";
export { SyncCommand } from "./cli/sync-command.js";
export { LinkCommand } from "./cli/link-command.js";
export { UsersCommand } from "./cli/users-command.js";
export { RestartCommand } from "./cli/restart-command.js";
