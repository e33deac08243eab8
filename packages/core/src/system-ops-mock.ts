/**
 * Mock SystemOperations for testing.
 *
 * Takes a root; all paths are relative (resolved internally).
 * Records every write for assertion and can be told to fail them.
 */

import { resolve } from "node:path";
import type { SystemOperations } from "./system-ops.js";
import type { FileSystemError, IOError } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

export type RecordedWrite = { path: string; content: string };

export class MockSystemOps implements SystemOperations {
  public readonly root: string;
  private files: Map<string, string> = new Map();
  private dirs: Set<string> = new Set();
  private failures: Map<string, FileSystemError> = new Map();
  public writes: RecordedWrite[] = [];

  constructor(root: string) {
    this.root = resolve(root);
  }

  private resolve(path: string): string {
    return resolve(this.root, path);
  }

  /** Add a simulated file (relative path) */
  addFile(path: string, content: string): void {
    this.files.set(this.resolve(path), content);
  }

  /** Current contents of a simulated file, if any */
  contentOf(path: string): string | undefined {
    return this.files.get(this.resolve(path));
  }

  /** Make the next writes to `path` fail with `error` until cleared */
  failWrites(path: string, error: FileSystemError): void {
    this.failures.set(this.resolve(path), error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const content = this.files.get(this.resolve(path));
    if (content === undefined) return err({ kind: "not_found", path });
    return ok(content);
  }

  async writeFile(path: string, content: string): Promise<Result<void, FileSystemError>> {
    const full = this.resolve(path);
    const failure = this.failures.get(full);
    if (failure) return err(failure);
    this.files.set(full, content);
    this.writes.push({ path, content });
    return ok(undefined);
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    const full = this.resolve(path);
    return ok(this.files.has(full) || this.dirs.has(full));
  }

  async mkdir(path: string): Promise<Result<void, FileSystemError>> {
    this.dirs.add(this.resolve(path));
    return ok(undefined);
  }
}
