/**
 * Permission configurator — let the web server write a project's writable dirs.
 *
 * Projects under the default web root already carry the web server's group,
 * so they only get the mode. Projects elsewhere also get group ownership and
 * ACL grants (immediate and default) for the web-server identity.
 *
 * Every step is checked; the first failure aborts before the vhost is written.
 */

import { join } from "node:path";
import type { ProvisionContext } from "./context.js";
import type { PermissionStep, ProjectDescriptor, ProvisionError, Result } from "./types.js";
import { formatFileSystemError } from "./types.js";
import { ok, err } from "./result.js";
import { ACL_PACKAGE, WRITABLE_MODE } from "./constants.js";
import { ensureInstalled } from "./installer.js";
import { track, trackExec } from "./progress.js";

export function isInsideDefaultRoot(path: string, defaultRoot: string): boolean {
  return path.startsWith(defaultRoot);
}

export function describeProject(
  name: string,
  path: string,
  defaultRoot: string,
): ProjectDescriptor {
  return Object.freeze({ name, path, insideDefaultRoot: isInsideDefaultRoot(path, defaultRoot) });
}

function failed(step: PermissionStep, message: string): Result<never, ProvisionError> {
  return err({ kind: "permissions_failed", step, message });
}

export async function applyPermissions(
  project: ProjectDescriptor,
  ctx: ProvisionContext,
): Promise<Result<void, ProvisionError>> {
  const { ops, out, config } = ctx;
  const writable = config.writableDirs.map((dir) => join(project.path, dir));
  const aclSubject = `u:${config.webUser}:rwx`;

  if (project.insideDefaultRoot) {
    out.write(`Setting permissions for a project inside ${config.defaultRoot}...`);
  } else {
    out.write(`Setting permissions for a project outside ${config.defaultRoot}...`);

    const acl = await ensureInstalled(ACL_PACKAGE, ctx);
    if (!acl.ok) {
      return failed("acl_install", acl.error.message);
    }
  }

  // before chgrp, or new dirs keep root's group
  for (const dir of writable) {
    const isDir = await ops.isDirectory(dir);
    if (!isDir.ok) return failed("mkdir", isDir.error.message);
    if (isDir.value) continue;
    const created = await track(out, `mkdir -p ${dir}`, () => ops.mkdir(dir));
    if (!created.ok) return failed("mkdir", formatFileSystemError(created.error));
  }

  if (!project.insideDefaultRoot) {
    out.write(`Changing group ownership to ${config.webUser}...`);
    const chgrp = await trackExec(ops, out, "chgrp", ["-R", config.webUser, project.path]);
    if (!chgrp.ok) return failed("chgrp", chgrp.error.message);
  }

  out.write("Setting writable permissions for storage and cache directories...");
  const chmod = await trackExec(ops, out, "chmod", ["-R", WRITABLE_MODE, ...writable]);
  if (!chmod.ok) return failed("chmod", chmod.error.message);

  if (!project.insideDefaultRoot) {
    out.write("Applying ACL permissions...");
    const grant = await trackExec(ops, out, "setfacl", ["-R", "-m", aclSubject, ...writable]);
    if (!grant.ok) return failed("setfacl", grant.error.message);

    const inherit = await trackExec(ops, out, "setfacl", ["-dR", "-m", aclSubject, ...writable]);
    if (!inherit.ok) return failed("setfacl_default", inherit.error.message);
  }

  return ok(undefined);
}
