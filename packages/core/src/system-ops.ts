/**
 * SystemOperations — abstraction over the host: filesystem, processes, identity.
 *
 * All paths are absolute. Each method declares exactly which errors it can
 * return; nothing throws.
 */

import type {
  Result,
  NotFoundError,
  AlreadyExistsError,
  PermissionDeniedError,
  IOError,
  ExecError,
} from "./types.js";

export type ExecOutput = {
  stdout: string;
  stderr: string;
};

export type WriteMode = "create" | "append";

export interface SystemOperations {
  /** True when the effective uid is root */
  isElevated(): boolean;

  /** Home directory used for `~` expansion */
  homeDir(): string;

  /** Check whether a command resolves on PATH */
  commandExists(command: string): Promise<Result<boolean, IOError>>;

  /** Run a process to completion. Non-zero exit is an error. */
  exec(command: string, args: readonly string[]): Promise<Result<ExecOutput, ExecError>>;

  /** Check if a path exists */
  exists(path: string): Promise<Result<boolean, IOError>>;

  /** Check if a path exists and is a directory */
  isDirectory(path: string): Promise<Result<boolean, IOError>>;

  /** Create a directory and its parents */
  mkdir(path: string): Promise<Result<void, NotFoundError | PermissionDeniedError | IOError>>;

  /** Read file contents */
  readFile(path: string): Promise<Result<string, NotFoundError | PermissionDeniedError | IOError>>;

  /**
   * Write content to a file.
   * "create" fails with already_exists if the file is there; "append" creates or extends.
   */
  writeFile(
    path: string,
    content: string,
    mode: WriteMode,
  ): Promise<Result<void, NotFoundError | AlreadyExistsError | PermissionDeniedError | IOError>>;
}
