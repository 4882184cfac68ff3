/**
 * Virtual-host generator — Apache <VirtualHost> block for a project.
 */

import type { ProvisionContext } from "./context.js";
import type { ProjectDescriptor, ProvisionError, Result } from "./types.js";
import { formatFileSystemError } from "./types.js";
import { ok, err } from "./result.js";
import { vhostPathFor } from "./config.js";
import { DEFAULT_CONFIG } from "./constants.js";
import { track } from "./progress.js";

/**
 * Render the virtual-host config. Pure: same inputs, same bytes.
 * Paths are quoted so a directory with spaces stays one argument.
 * `${APACHE_LOG_DIR}` is left for Apache to expand.
 */
export function renderVirtualHost(name: string, path: string, tld = DEFAULT_CONFIG.tld): string {
  const host = `${name}.${tld}`;
  return [
    "<VirtualHost *:80>",
    `    ServerAdmin admin@${host}`,
    `    ServerName ${host}`,
    `    DocumentRoot "${path}/public"`,
    "",
    `    <Directory "${path}">`,
    "        Options Indexes FollowSymLinks",
    "        AllowOverride All",
    "        Require all granted",
    "    </Directory>",
    "",
    "    ErrorLog ${APACHE_LOG_DIR}/error.log",
    "    CustomLog ${APACHE_LOG_DIR}/access.log combined",
    "</VirtualHost>",
    "",
  ].join("\n");
}

/** Write the project's vhost file. Never overwrites; returns the path written. */
export async function writeVirtualHost(
  project: ProjectDescriptor,
  ctx: ProvisionContext,
): Promise<Result<string, ProvisionError>> {
  const { ops, out, config } = ctx;
  const path = vhostPathFor(config, project.name);
  const content = renderVirtualHost(project.name, project.path, config.tld);

  out.write("Creating virtual host configuration...");
  const written = await track(out, `write ${path}`, () => ops.writeFile(path, content, "create"));
  if (!written.ok) {
    return err({ kind: "vhost_write_failed", path, message: formatFileSystemError(written.error) });
  }
  return ok(path);
}
