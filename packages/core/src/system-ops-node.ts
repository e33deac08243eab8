/**
 * NodeSystemOps — real file operations via Node.js APIs.
 *
 * Takes a root directory; all paths are relative and validated
 * against traversal. Maps errno codes to typed Result errors.
 */

import { resolve, relative, dirname, basename, join } from "node:path";
import {
  readFile,
  writeFile as fsWriteFile,
  rename,
  rm,
  mkdir as fsMkdir,
  access,
} from "node:fs/promises";
import type { SystemOperations } from "./system-ops.js";
import type { FileSystemError, IOError } from "./types.js";
import type { Result } from "./result.js";
import { ok, err, errorMessage } from "./result.js";

/** Map Node.js errno to our typed errors */
function mapError(e: unknown, path: string, operation: string): FileSystemError {
  if (e instanceof Error && "code" in e) {
    const code = e.code;
    if (code === "ENOENT") return { kind: "not_found", path };
    if (code === "EACCES" || code === "EPERM") {
      return { kind: "permission_denied", path, operation };
    }
  }
  return { kind: "io_error", path, message: errorMessage(e) };
}

export class NodeSystemOps implements SystemOperations {
  public readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /** Resolve a relative path, rejecting traversal outside the root */
  private resolvePath(path: string): Result<string, IOError> {
    const full = resolve(this.root, path);
    const rel = relative(this.root, full);
    if (rel.startsWith("..")) {
      return err({
        kind: "io_error",
        path,
        message: "Path traversal outside root",
      });
    }
    return ok(full);
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;

    try {
      const content = await readFile(resolved.value, "utf-8");
      return ok(content);
    } catch (e) {
      return err(mapError(e, path, "readFile"));
    }
  }

  async writeFile(path: string, content: string): Promise<Result<void, FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;

    const target = resolved.value;
    // Same directory as the target so rename() stays on one file system
    const temp = join(dirname(target), `.${basename(target)}.${process.pid}.tmp`);
    try {
      await fsMkdir(dirname(target), { recursive: true });
      await fsWriteFile(temp, content, "utf-8");
      await rename(temp, target);
      return ok(undefined);
    } catch (e) {
      await rm(temp, { force: true }).catch(() => undefined);
      return err(mapError(e, path, "writeFile"));
    }
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return ok(false);
    try {
      await access(resolved.value);
      return ok(true);
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        return ok(false);
      }
      return err({
        kind: "io_error",
        path,
        message: `exists: ${errorMessage(e)}`,
      });
    }
  }

  async mkdir(path: string): Promise<Result<void, FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;
    try {
      await fsMkdir(resolved.value, { recursive: true });
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "mkdir"));
    }
  }
}
