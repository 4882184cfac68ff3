/**
 * Operator input — read and validate project name, paths and repository URL.
 *
 * Every reader checks its value before anything on disk changes. Collisions
 * with an existing site or hostname abort instead of re-prompting.
 */

import { resolve } from "node:path";
import type { ProvisionContext } from "./context.js";
import type { ProvisionError, Result } from "./types.js";
import { formatFileSystemError } from "./types.js";
import { ok, err } from "./result.js";
import { hostnameFor, vhostPathFor } from "./config.js";
import { track } from "./progress.js";

export const PROMPTS = {
  name: "Enter the project name (no spaces allowed):",
  existingPath:
    "Enter the full path to the Laravel project (e.g., /home/user/Projects/my-laravel-project or /var/www/my-laravel-project):",
  cloneDestination:
    "Enter the full path where the project should be cloned (e.g., /home/user/Projects):",
  repository: "Enter the Git repository link:",
} as const;

/** Expand `~`, then make the path absolute. Empty input stays empty. */
function normalizePath(raw: string, home: string): string {
  const expanded = expandHome(raw.trim(), home);
  return expanded.length > 0 ? resolve(expanded) : "";
}

/**
 * Replace a leading `~` (alone or before `/`) with `home`.
 * `~user` forms are left as they are.
 */
export function expandHome(path: string, home: string): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return home.replace(/\/+$/, "") + path.slice(1);
  return path;
}

const HOST_LABEL = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/i;

export function validateProjectName(raw: string): Result<string, ProvisionError> {
  const name = raw.trim();
  if (name.length === 0) {
    return err({ kind: "validation", field: "name", message: "Project name cannot be empty." });
  }
  if (/\s/.test(name)) {
    return err({
      kind: "validation",
      field: "name",
      message: "Project name cannot contain spaces.",
    });
  }
  if (name.includes("/")) {
    return err({ kind: "validation", field: "name", message: "Project name cannot contain '/'." });
  }
  // one DNS label: it becomes <name>.<tld>, <name>.conf and <dest>/<name>
  if (!HOST_LABEL.test(name)) {
    return err({
      kind: "validation",
      field: "name",
      message: "Project name may only use letters, digits and inner hyphens.",
    });
  }
  return ok(name);
}

/** True when a non-comment hosts line maps `hostname` */
export function hostsFileMaps(content: string, hostname: string): boolean {
  const wanted = hostname.toLowerCase();
  return content.split("\n").some((line) => {
    const fields = line.replace(/#.*$/, "").trim().split(/\s+/);
    // first field is the address
    return fields.slice(1).some((h) => h.toLowerCase() === wanted);
  });
}

/** Ask for the project name; reject malformed names and names already in use. */
export async function readProjectName(
  ctx: ProvisionContext,
): Promise<Result<string, ProvisionError>> {
  const { ops, prompt, config } = ctx;

  const answer = await prompt.ask(PROMPTS.name);
  const named = validateProjectName(answer ?? "");
  if (!named.ok) return named;
  const name = named.value;

  const vhostPath = vhostPathFor(config, name);
  const vhostExists = await ops.exists(vhostPath);
  if (!vhostExists.ok) return err(vhostExists.error);
  if (vhostExists.value) {
    return err({ kind: "collision", target: "vhost", name, location: vhostPath });
  }

  const hostname = hostnameFor(config, name);
  const hosts = await ops.readFile(config.hostsFile);
  if (!hosts.ok && hosts.error.kind !== "not_found") {
    return err({
      kind: "io_error",
      path: config.hostsFile,
      message: formatFileSystemError(hosts.error),
    });
  }
  if (hosts.ok && hostsFileMaps(hosts.value, hostname)) {
    return err({
      kind: "collision",
      target: "hostname",
      name: hostname,
      location: config.hostsFile,
    });
  }

  return ok(name);
}

/**
 * Ask for an existing project directory until one is given.
 * Gives up after `maxPathAttempts` answers, or when input closes.
 */
export async function readExistingPath(
  ctx: ProvisionContext,
): Promise<Result<string, ProvisionError>> {
  const { ops, out, prompt, config } = ctx;

  for (let attempt = 1; attempt <= config.maxPathAttempts; attempt++) {
    const answer = await prompt.ask(PROMPTS.existingPath);
    if (answer === undefined) break;

    const path = normalizePath(answer, ops.homeDir());
    if (path.length > 0) {
      const isDir = await ops.isDirectory(path);
      if (!isDir.ok) return err(isDir.error);
      if (isDir.value) return ok(path);
    }
    out.warn("The specified path does not exist. Please enter a valid path.");
  }

  return err({
    kind: "validation",
    field: "path",
    message: `No existing project directory given after ${config.maxPathAttempts} attempt(s).`,
  });
}

/** Ask where to clone; create the directory when it is missing. */
export async function readCloneDestination(
  ctx: ProvisionContext,
): Promise<Result<string, ProvisionError>> {
  const { ops, out, prompt } = ctx;

  const answer = (await prompt.ask(PROMPTS.cloneDestination)) ?? "";
  const path = normalizePath(answer, ops.homeDir());
  if (path.length === 0) {
    return err({
      kind: "validation",
      field: "destination",
      message: "Clone path cannot be empty.",
    });
  }

  const isDir = await ops.isDirectory(path);
  if (!isDir.ok) return err(isDir.error);
  if (isDir.value) return ok(path);

  out.write("The specified path does not exist. Creating it...");
  const created = await track(out, `mkdir -p ${path}`, () => ops.mkdir(path));
  if (!created.ok) {
    return err({ kind: "directory_failed", path, message: formatFileSystemError(created.error) });
  }
  return ok(path);
}

export async function readRepositoryUrl(
  ctx: ProvisionContext,
): Promise<Result<string, ProvisionError>> {
  const url = ((await ctx.prompt.ask(PROMPTS.repository)) ?? "").trim();
  if (url.length === 0) {
    return err({
      kind: "validation",
      field: "repository",
      message: "Git repository link cannot be empty.",
    });
  }
  return ok(url);
}
