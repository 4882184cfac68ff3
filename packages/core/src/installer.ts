/**
 * Dependency installer — make sure an OS package is present, via apt.
 *
 * Idempotent: a package whose command already resolves on PATH is left alone.
 */

import type { ProvisionContext } from "./context.js";
import type { Dependency, ProvisionError, Result } from "./types.js";
import { ok, err } from "./result.js";
import { PACKAGE_MANAGER } from "./constants.js";
import { trackExec } from "./progress.js";

export type InstallationError = Extract<ProvisionError, { kind: "installation_failed" }>;

export type InstallResult = {
  /** false when the package was already present */
  installed: boolean;
};

export async function ensureInstalled(
  dep: Dependency,
  ctx: Pick<ProvisionContext, "ops" | "out">,
): Promise<Result<InstallResult, InstallationError>> {
  const { ops, out } = ctx;

  const present = await ops.commandExists(dep.command);
  if (!present.ok) {
    return err({
      kind: "installation_failed",
      package: dep.package,
      message: present.error.message,
    });
  }
  if (present.value) {
    out.info(`${dep.package} is already installed.`);
    return ok({ installed: false });
  }

  out.write(`${dep.package} not found. Installing...`);
  const [refreshCmd, ...refreshArgs] = PACKAGE_MANAGER.refresh;
  const refresh = await trackExec(ops, out, refreshCmd, refreshArgs);
  if (!refresh.ok) {
    return err({
      kind: "installation_failed",
      package: dep.package,
      message: `package index refresh failed: ${refresh.error.message}`,
    });
  }

  const [installCmd, ...installArgs] = PACKAGE_MANAGER.install;
  const install = await trackExec(ops, out, installCmd, [...installArgs, dep.package]);
  if (!install.ok) {
    return err({
      kind: "installation_failed",
      package: dep.package,
      message: install.error.message,
    });
  }

  // apt can exit 0 without providing the command (e.g. a renamed package)
  const verified = await ops.commandExists(dep.command);
  if (!verified.ok || !verified.value) {
    return err({
      kind: "installation_failed",
      package: dep.package,
      message: `${dep.command} still not found after installing ${dep.package}`,
    });
  }

  out.success(`Installed ${dep.package}.`);
  return ok({ installed: true });
}
