/**
 * LiveLogger — timestamped, level-colored lines on stderr via picocolors.
 */

import pc from "picocolors";
import type { Logger, LogFields, LogLevel } from "./logger.js";
import { formatFields, levelEnabled } from "./logger.js";

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: pc.dim,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

export class LiveLogger implements Logger {
  constructor(
    private minimum: LogLevel = "info",
    private stream: NodeJS.WritableStream = process.stderr,
  ) {}

  private emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (!levelEnabled(level, this.minimum)) return;
    const extra = formatFields(fields);
    const line = [
      pc.dim(new Date().toISOString()),
      LEVEL_STYLE[level](level.toUpperCase().padEnd(5)),
      message,
      extra ? pc.dim(extra) : "",
    ]
      .filter(Boolean)
      .join(" ");
    this.stream.write(line + "\n");
  }

  debug(message: string, fields?: LogFields): void {
    this.emit("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.emit("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.emit("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.emit("error", message, fields);
  }
}
