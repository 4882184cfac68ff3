/**
 * NodeSystemOps — real OS-level operations via Node.js APIs.
 *
 * Maps errno codes to typed Result errors. Processes run through execFile,
 * never a shell.
 */

import { delimiter, join } from "node:path";
import { homedir } from "node:os";
import { constants } from "node:fs";
import {
  stat as fsStat,
  readFile as fsReadFile,
  writeFile as fsWriteFile,
  mkdir as fsMkdir,
  access,
} from "node:fs/promises";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { ExecOutput, SystemOperations, WriteMode } from "./system-ops.js";
import type {
  AlreadyExistsError,
  ExecError,
  IOError,
  NotFoundError,
  PermissionDeniedError,
  Result,
} from "./types.js";
import { ok, err, errorMessage } from "./result.js";

const execFileAsync = promisify(execFile);

type FileError = NotFoundError | AlreadyExistsError | PermissionDeniedError | IOError;

function errnoOf(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

/** Map Node.js errno to our typed errors */
function mapError(e: unknown, path: string, operation: string): FileError {
  const code = errnoOf(e);
  if (code === "ENOENT") return { kind: "not_found", path };
  if (code === "EEXIST") return { kind: "already_exists", path };
  if (code === "EACCES" || code === "EPERM") {
    return { kind: "permission_denied", path, operation };
  }
  return { kind: "io_error", path, message: errorMessage(e) };
}

/** Turn an execFile rejection into an ExecError, keeping stderr when there is one */
function mapExecError(e: unknown, command: string): ExecError {
  // Spawn failures carry a string errno in `code`, exits carry a number
  const code = e instanceof Error && "code" in e ? e.code : undefined;
  const stderr =
    e instanceof Error && "stderr" in e && typeof e.stderr === "string" ? e.stderr.trim() : "";
  return {
    kind: "exec_failed",
    command,
    exitCode: typeof code === "number" ? code : null,
    message: stderr || errorMessage(e),
  };
}

export class NodeSystemOps implements SystemOperations {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isElevated(): boolean {
    return typeof process.geteuid === "function" && process.geteuid() === 0;
  }

  homeDir(): string {
    return this.env.HOME ?? homedir();
  }

  async commandExists(command: string): Promise<Result<boolean, IOError>> {
    const dirs = (this.env.PATH ?? "").split(delimiter).filter((d) => d.length > 0);
    for (const dir of dirs) {
      try {
        await access(join(dir, command), constants.X_OK);
        return ok(true);
      } catch (e) {
        const code = errnoOf(e);
        if (code === "ENOENT" || code === "EACCES" || code === "ENOTDIR") continue;
        return err({ kind: "io_error", path: dir, message: `commandExists: ${errorMessage(e)}` });
      }
    }
    return ok(false);
  }

  async exec(command: string, args: readonly string[]): Promise<Result<ExecOutput, ExecError>> {
    const display = [command, ...args].join(" ");
    try {
      const { stdout, stderr } = await execFileAsync(command, [...args], {
        env: this.env,
        maxBuffer: 16 * 1024 * 1024,
      });
      return ok({ stdout, stderr });
    } catch (e) {
      return err(mapExecError(e, display));
    }
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    try {
      await access(path);
      return ok(true);
    } catch (e) {
      if (errnoOf(e) === "ENOENT") return ok(false);
      return err({ kind: "io_error", path, message: `exists: ${errorMessage(e)}` });
    }
  }

  async isDirectory(path: string): Promise<Result<boolean, IOError>> {
    try {
      const s = await fsStat(path);
      return ok(s.isDirectory());
    } catch (e) {
      const code = errnoOf(e);
      if (code === "ENOENT" || code === "ENOTDIR") return ok(false);
      return err({ kind: "io_error", path, message: `isDirectory: ${errorMessage(e)}` });
    }
  }

  async mkdir(
    path: string,
  ): Promise<Result<void, NotFoundError | PermissionDeniedError | IOError>> {
    try {
      await fsMkdir(path, { recursive: true });
      return ok(undefined);
    } catch (e) {
      const mapped = mapError(e, path, "mkdir");
      // recursive mkdir over an existing non-directory reports EEXIST
      if (mapped.kind === "already_exists") {
        return err({ kind: "io_error", path, message: "exists and is not a directory" });
      }
      return err(mapped);
    }
  }

  async readFile(
    path: string,
  ): Promise<Result<string, NotFoundError | PermissionDeniedError | IOError>> {
    try {
      return ok(await fsReadFile(path, "utf-8"));
    } catch (e) {
      const mapped = mapError(e, path, "readFile");
      if (mapped.kind === "already_exists") {
        return err({ kind: "io_error", path, message: "unexpected EEXIST" });
      }
      return err(mapped);
    }
  }

  async writeFile(
    path: string,
    content: string,
    mode: WriteMode,
  ): Promise<Result<void, FileError>> {
    try {
      await fsWriteFile(path, content, { encoding: "utf-8", flag: mode === "create" ? "wx" : "a" });
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "writeFile"));
    }
  }
}
