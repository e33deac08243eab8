/**
 * LiveConsoleOutput — terminal output with colors via picocolors.
 * Errors go to stderr, everything else to stdout.
 */

import pc from "picocolors";
import type { ConsoleOutput } from "./console.js";

export class LiveConsoleOutput implements ConsoleOutput {
  constructor(
    private stdout: NodeJS.WritableStream = process.stdout,
    private stderr: NodeJS.WritableStream = process.stderr,
  ) {}

  private emit(stream: NodeJS.WritableStream, text: string, newline: boolean): void {
    stream.write(newline ? text + "\n" : text);
  }

  write(text: string, newline = true): void {
    this.emit(this.stdout, text, newline);
  }

  error(text: string, newline = true): void {
    this.emit(this.stderr, pc.red(text), newline);
  }

  success(text: string, newline = true): void {
    this.emit(this.stdout, pc.green(text), newline);
  }

  warn(text: string, newline = true): void {
    this.emit(this.stdout, pc.yellow(text), newline);
  }

  info(text: string, newline = true): void {
    this.emit(this.stdout, pc.dim(text), newline);
  }

  heading(text: string, newline = true): void {
    this.emit(this.stdout, pc.bold(text), newline);
  }
}
