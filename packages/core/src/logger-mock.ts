/**
 * MockLogger — captures log entries for test assertions.
 */

import type { Logger, LogFields, LogLevel } from "./logger.js";

export type CapturedEntry = {
  level: LogLevel;
  message: string;
  fields?: LogFields;
};

export class MockLogger implements Logger {
  public entries: CapturedEntry[] = [];

  debug(message: string, fields?: LogFields): void {
    this.entries.push({ level: "debug", message, fields });
  }

  info(message: string, fields?: LogFields): void {
    this.entries.push({ level: "info", message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.entries.push({ level: "warn", message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.entries.push({ level: "error", message, fields });
  }

  /** Messages logged at a level */
  messagesAt(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}
