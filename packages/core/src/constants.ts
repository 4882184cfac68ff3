/**
 * Shared constants for vhostup.
 */

import type { Dependency, HostConfig } from "./types.js";

/** Debian/Ubuntu Apache layout */
export const DEFAULT_CONFIG: HostConfig = {
  sitesAvailableDir: "/etc/apache2/sites-available",
  hostsFile: "/etc/hosts",
  defaultRoot: "/var/www",
  webUser: "www-data",
  tld: "test",
  loopbackAddress: "127.0.0.1",
  writableDirs: ["storage", "bootstrap/cache"],
  maxPathAttempts: 5,
};

export const ACL_PACKAGE: Dependency = { package: "acl", command: "setfacl" } as const;
export const GIT_PACKAGE: Dependency = { package: "git", command: "git" } as const;

export const PACKAGE_MANAGER = {
  refresh: ["apt-get", "update"],
  install: ["apt-get", "install", "-y"],
} as const;

export const APACHE = {
  configTest: ["apache2ctl", "configtest"],
  enableSite: "a2ensite",
  reload: ["systemctl", "reload", "apache2"],
} as const;

/** Mode applied recursively to the writable directories */
export const WRITABLE_MODE = "775";
