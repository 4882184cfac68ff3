/**
 * Config helpers — merge overrides onto defaults, derive per-project names.
 */

import { join } from "node:path";
import type { HostConfig } from "./types.js";
import { DEFAULT_CONFIG } from "./constants.js";
import { parseConfig } from "./schema.js";

/** Validate a raw override (e.g. parsed JSON) and merge it onto the defaults. */
export function loadConfig(raw: unknown, base: HostConfig = DEFAULT_CONFIG): HostConfig {
  return { ...base, ...parseConfig(raw) };
}

/** `blog` → `blog.test` */
export function hostnameFor(config: HostConfig, name: string): string {
  return `${name}.${config.tld}`;
}

/** Where the project's virtual-host file lives */
export function vhostPathFor(config: HostConfig, name: string): string {
  return join(config.sitesAvailableDir, `${name}.conf`);
}

/** The line appended to the hosts file */
export function hostsEntryFor(config: HostConfig, name: string): string {
  return `${config.loopbackAddress}   ${hostnameFor(config, name)}`;
}
