/**
 * Provisioning workflows.
 *
 * setupExisting: name → path → permissions → vhost → activation
 * setupFromGit:  git → url → destination → name → clone → (same tail)
 *
 * Input is validated before anything is changed. The project descriptor is
 * built once and passed down; nothing is shared between runs.
 */

import { join } from "node:path";
import type { ProvisionContext } from "./context.js";
import type { ProjectDescriptor, ProvisionError, Result } from "./types.js";
import { ok, err } from "./result.js";
import { GIT_PACKAGE } from "./constants.js";
import { ensureInstalled } from "./installer.js";
import {
  readCloneDestination,
  readExistingPath,
  readProjectName,
  readRepositoryUrl,
} from "./input.js";
import { applyPermissions, describeProject } from "./permissions.js";
import { writeVirtualHost } from "./vhost.js";
import { activateSite } from "./activate.js";
import type { ActivationResult } from "./activate.js";
import { trackExec } from "./progress.js";

export type ProvisionResult = {
  project: ProjectDescriptor;
  /** Path of the vhost file written */
  confPath: string;
  activation: ActivationResult;
};

/** Permissions, vhost file and activation: shared tail of both workflows. */
async function configureSite(
  project: ProjectDescriptor,
  ctx: ProvisionContext,
): Promise<Result<ProvisionResult, ProvisionError>> {
  const permissions = await applyPermissions(project, ctx);
  if (!permissions.ok) return permissions;

  const confPath = await writeVirtualHost(project, ctx);
  if (!confPath.ok) return confPath;

  const activation = await activateSite(project, ctx);
  if (!activation.ok) return activation;

  return ok({ project, confPath: confPath.value, activation: activation.value });
}

/** Set up a virtual host for a project already on disk. */
export async function setupExisting(
  ctx: ProvisionContext,
): Promise<Result<ProvisionResult, ProvisionError>> {
  const name = await readProjectName(ctx);
  if (!name.ok) return name;

  const path = await readExistingPath(ctx);
  if (!path.ok) return path;

  return configureSite(describeProject(name.value, path.value, ctx.config.defaultRoot), ctx);
}

/** Clone a repository into `<destination>/<name>`, then set up its virtual host. */
export async function setupFromGit(
  ctx: ProvisionContext,
): Promise<Result<ProvisionResult, ProvisionError>> {
  const { ops, out, config } = ctx;

  out.write("Checking Git installation...");
  const git = await ensureInstalled(GIT_PACKAGE, ctx);
  if (!git.ok) return git;

  const repository = await readRepositoryUrl(ctx);
  if (!repository.ok) return repository;

  const destination = await readCloneDestination(ctx);
  if (!destination.ok) return destination;

  const name = await readProjectName(ctx);
  if (!name.ok) return name;

  const projectPath = join(destination.value, name.value);
  out.write("Cloning the repository...");
  const clone = await trackExec(ops, out, "git", ["clone", repository.value, projectPath]);
  if (!clone.ok) {
    return err({
      kind: "clone_failed",
      repository: repository.value,
      destination: projectPath,
      message: clone.error.message,
    });
  }
  out.success(`Repository successfully cloned to ${projectPath}.`);

  return configureSite(describeProject(name.value, projectPath, config.defaultRoot), ctx);
}
