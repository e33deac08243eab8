/**
 * SystemOperations — abstraction over file access.
 *
 * Takes a root directory at construction time; all paths are relative.
 * Each method declares exactly which errors it can return.
 */

import type { Result } from "./result.js";
import type { IOError, NotFoundError, PermissionDeniedError } from "./types.js";

export interface SystemOperations {
  /** The directory this instance operates on */
  readonly root: string;

  /** Read file contents (relative path) */
  readFile(path: string): Promise<Result<string, NotFoundError | PermissionDeniedError | IOError>>;

  /**
   * Replace a file's contents in one step (relative path). Readers see the
   * old or the new contents, never a partial write. Creates parent dirs.
   */
  writeFile(
    path: string,
    content: string,
  ): Promise<Result<void, NotFoundError | PermissionDeniedError | IOError>>;

  /** Check if a path exists (relative path) */
  exists(path: string): Promise<Result<boolean, IOError>>;

  /** Create a directory (relative path). Creates parent dirs if needed. */
  mkdir(path: string): Promise<Result<void, NotFoundError | PermissionDeniedError | IOError>>;
}
