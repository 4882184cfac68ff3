/**
 * Mock SystemOperations for testing.
 *
 * In-memory files and directories, a simulated PATH, scripted process exits.
 * Records every mutation and process for assertion.
 */

import { dirname } from "node:path";
import type { ExecOutput, SystemOperations, WriteMode } from "./system-ops.js";
import type {
  Result,
  NotFoundError,
  AlreadyExistsError,
  PermissionDeniedError,
  IOError,
  ExecError,
} from "./types.js";
import { ok, err } from "./result.js";

export type RecordedOp =
  | { kind: "exec"; command: string; args: string[] }
  | { kind: "mkdir"; path: string }
  | { kind: "write"; path: string; content: string; mode: WriteMode };

type ScriptedExit = { exitCode: number; message: string };

export class MockSystemOps implements SystemOperations {
  private files: Map<string, string> = new Map();
  private dirs: Set<string> = new Set(["/"]);
  private commands: Set<string> = new Set();
  private failures: Map<string, ScriptedExit> = new Map();
  private effects: Map<string, () => void> = new Map();
  private unreadable: Set<string> = new Set();
  public ops: RecordedOp[] = [];
  public elevated = true;

  constructor(private readonly home = "/home/operator") {}

  /** Add a simulated directory (and its parents) */
  addDir(path: string): void {
    let p = path;
    while (!this.dirs.has(p)) {
      this.dirs.add(p);
      const parent = dirname(p);
      if (parent === p) break;
      p = parent;
    }
  }

  /** Add a simulated file; its parent directories are created */
  addFile(path: string, content: string): void {
    this.addDir(dirname(path));
    this.files.set(path, content);
  }

  /** Make a command resolvable on PATH */
  addCommand(command: string): void {
    this.commands.add(command);
  }

  /** Make `readFile(path)` fail with permission_denied */
  denyRead(path: string): void {
    this.unreadable.add(path);
  }

  /** Make the process with this exact command line exit non-zero */
  failExec(commandLine: string, exitCode = 1, message = "simulated failure"): void {
    this.failures.set(commandLine, { exitCode, message });
  }

  /** Run `effect` when the process with this exact command line succeeds */
  onExec(commandLine: string, effect: () => void): void {
    this.effects.set(commandLine, effect);
  }

  /** Current content of a simulated file */
  fileContent(path: string): string | undefined {
    return this.files.get(path);
  }

  hasDir(path: string): boolean {
    return this.dirs.has(path);
  }

  /** Command lines of every exec, in order */
  execLog(): string[] {
    return this.ops.flatMap((op) =>
      op.kind === "exec" ? [[op.command, ...op.args].join(" ")] : [],
    );
  }

  isElevated(): boolean {
    return this.elevated;
  }

  homeDir(): string {
    return this.home;
  }

  async commandExists(command: string): Promise<Result<boolean, IOError>> {
    return ok(this.commands.has(command));
  }

  async exec(command: string, args: readonly string[]): Promise<Result<ExecOutput, ExecError>> {
    this.ops.push({ kind: "exec", command, args: [...args] });
    const commandLine = [command, ...args].join(" ");
    const failure = this.failures.get(commandLine);
    if (failure) {
      return err({
        kind: "exec_failed",
        command: commandLine,
        exitCode: failure.exitCode,
        message: failure.message,
      });
    }
    this.effects.get(commandLine)?.();
    return ok({ stdout: "", stderr: "" });
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    return ok(this.files.has(path) || this.dirs.has(path));
  }

  async isDirectory(path: string): Promise<Result<boolean, IOError>> {
    return ok(this.dirs.has(path));
  }

  async mkdir(
    path: string,
  ): Promise<Result<void, NotFoundError | PermissionDeniedError | IOError>> {
    if (this.files.has(path)) {
      return err({ kind: "io_error", path, message: "exists and is not a directory" });
    }
    this.ops.push({ kind: "mkdir", path });
    this.addDir(path);
    return ok(undefined);
  }

  async readFile(
    path: string,
  ): Promise<Result<string, NotFoundError | PermissionDeniedError | IOError>> {
    if (this.unreadable.has(path)) {
      return err({ kind: "permission_denied", path, operation: "readFile" });
    }
    const content = this.files.get(path);
    if (content === undefined) return err({ kind: "not_found", path });
    return ok(content);
  }

  async writeFile(
    path: string,
    content: string,
    mode: WriteMode,
  ): Promise<Result<void, NotFoundError | AlreadyExistsError | PermissionDeniedError | IOError>> {
    if (!this.dirs.has(dirname(path))) return err({ kind: "not_found", path });
    const current = this.files.get(path);
    if (mode === "create" && current !== undefined) {
      return err({ kind: "already_exists", path });
    }
    this.ops.push({ kind: "write", path, content, mode });
    this.files.set(path, mode === "append" ? (current ?? "") + content : content);
    return ok(undefined);
  }
}
