/**
 * Site activator — configtest, then a2ensite, hosts entry, reload.
 *
 * A failed configtest is an outcome, not an error: the new file stays on disk
 * but nothing else is touched.
 */

import type { ProvisionContext } from "./context.js";
import type { ActivationStep, ProjectDescriptor, ProvisionError, Result } from "./types.js";
import { formatFileSystemError } from "./types.js";
import { ok, err } from "./result.js";
import { hostnameFor, hostsEntryFor, vhostPathFor } from "./config.js";
import { APACHE } from "./constants.js";
import { track, trackExec } from "./progress.js";

export type ActivationResult =
  | { state: "reloaded"; url: string }
  | { state: "disabled"; confPath: string; output: string };

function failed(step: ActivationStep, message: string): Result<never, ProvisionError> {
  return err({ kind: "activation_failed", step, message });
}

export async function activateSite(
  project: ProjectDescriptor,
  ctx: ProvisionContext,
): Promise<Result<ActivationResult, ProvisionError>> {
  const { ops, out, config } = ctx;

  out.write("Testing Apache configuration...");
  const [testCmd, ...testArgs] = APACHE.configTest;
  const test = await trackExec(ops, out, testCmd, testArgs);
  if (!test.ok) {
    return ok({
      state: "disabled",
      confPath: vhostPathFor(config, project.name),
      output: test.error.message,
    });
  }

  out.write("Enabling the virtual host...");
  const enable = await trackExec(ops, out, APACHE.enableSite, [`${project.name}.conf`]);
  if (!enable.ok) return failed("enable", enable.error.message);

  out.write(`Adding entry to ${config.hostsFile}...`);
  const current = await ops.readFile(config.hostsFile);
  // keep the new entry on its own line when the file lacks a trailing newline
  const needsBreak = current.ok && current.value.length > 0 && !current.value.endsWith("\n");
  const separator = needsBreak ? "\n" : "";
  const entry = `${separator}${hostsEntryFor(config, project.name)}\n`;
  const mapped = await track(out, `append ${config.hostsFile}`, () =>
    ops.writeFile(config.hostsFile, entry, "append"),
  );
  if (!mapped.ok) return failed("hosts", formatFileSystemError(mapped.error));

  out.write("Reloading Apache...");
  const [reloadCmd, ...reloadArgs] = APACHE.reload;
  const reload = await trackExec(ops, out, reloadCmd, reloadArgs);
  if (!reload.ok) return failed("reload", reload.error.message);

  return ok({ state: "reloaded", url: `http://${hostnameFor(config, project.name)}` });
}
