/**
 * Host config schema — runtime validation via Zod.
 *
 * The canonical type is HostConfig in types.ts. Override files may set any
 * subset of its keys.
 */

import { z } from "zod";
import type { HostConfig } from "./types.js";

const absolutePath = z.string().startsWith("/", { message: "must be an absolute path" });

export const hostConfigOverrideSchema: z.ZodType<Partial<HostConfig>> = z
  .object({
    sitesAvailableDir: absolutePath,
    hostsFile: absolutePath,
    defaultRoot: absolutePath,
    webUser: z.string().min(1),
    tld: z
      .string()
      .regex(/^[a-z0-9-]+$/i, { message: "must be a single domain label without dots" }),
    loopbackAddress: z.string().ip(),
    writableDirs: z.array(z.string().min(1)).min(1),
    maxPathAttempts: z.number().int().positive(),
  })
  .partial()
  .strict();

/**
 * Parse and validate a config override object. Throws ZodError on bad input.
 */
export function parseConfig(raw: unknown): Partial<HostConfig> {
  return hostConfigOverrideSchema.parse(raw);
}
