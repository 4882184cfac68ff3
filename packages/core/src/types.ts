/**
 * vhostup core types.
 *
 * The project descriptor, host configuration, and the error union every
 * workflow step returns.
 */

export type { Result } from "./result.js";

// ── Config ─────────────────────────────────────────────────────────────

export type HostConfig = {
  /** Apache's sites-available directory */
  sitesAvailableDir: string;
  /** System hosts file the hostname mapping is appended to */
  hostsFile: string;
  /** Web server's default document-root prefix */
  defaultRoot: string;
  /** Identity the web server runs as */
  webUser: string;
  /** Top-level domain for local hostnames (no leading dot) */
  tld: string;
  loopbackAddress: string;
  /** Project subdirectories the web server must be able to write */
  writableDirs: string[];
  /** How many times the project path is asked for before giving up */
  maxPathAttempts: number;
};

// ── Project ────────────────────────────────────────────────────────────

/** Built once from validated input, then passed through the workflow. */
export type ProjectDescriptor = Readonly<{
  name: string;
  /** Absolute path to the project root */
  path: string;
  insideDefaultRoot: boolean;
}>;

/** A package the tool may install, and the command that proves it is present. */
export type Dependency = Readonly<{
  package: string;
  command: string;
}>;

// ── System errors ──────────────────────────────────────────────────────

export type NotFoundError = { kind: "not_found"; path: string };
export type AlreadyExistsError = { kind: "already_exists"; path: string };
export type PermissionDeniedError = { kind: "permission_denied"; path: string; operation: string };
export type IOError = { kind: "io_error"; path: string; message: string };

export type FileSystemError = NotFoundError | AlreadyExistsError | PermissionDeniedError | IOError;

/** A process that could not be spawned or exited non-zero */
export type ExecError = {
  kind: "exec_failed";
  command: string;
  /** Exit code, or null when the process never started or was killed */
  exitCode: number | null;
  message: string;
};

// ── Provisioning errors ────────────────────────────────────────────────

export type InputField = "name" | "path" | "destination" | "repository";

export type ProvisionError =
  | { kind: "not_elevated" }
  | { kind: "validation"; field: InputField; message: string }
  | { kind: "collision"; target: "vhost" | "hostname"; name: string; location: string }
  | { kind: "installation_failed"; package: string; message: string }
  | { kind: "directory_failed"; path: string; message: string }
  | { kind: "clone_failed"; repository: string; destination: string; message: string }
  | { kind: "permissions_failed"; step: PermissionStep; message: string }
  | { kind: "vhost_write_failed"; path: string; message: string }
  | { kind: "activation_failed"; step: ActivationStep; message: string }
  | { kind: "io_error"; path: string; message: string };

export type PermissionStep =
  | "acl_install"
  | "chgrp"
  | "mkdir"
  | "chmod"
  | "setfacl"
  | "setfacl_default";

export type ActivationStep = "enable" | "hosts" | "reload";

/** Human-readable one-liner for a filesystem error */
export function formatFileSystemError(e: FileSystemError): string {
  switch (e.kind) {
    case "not_found":
      return `${e.path}: not found`;
    case "already_exists":
      return `${e.path}: already exists`;
    case "permission_denied":
      return `${e.path}: permission denied (${e.operation})`;
    case "io_error":
      return `${e.path}: ${e.message}`;
  }
}
