import type { SystemOperations } from "./system-ops.js";
import type { ProvisionError, Result } from "./types.js";
import { ok, err } from "./result.js";

/**
 * Fail unless running as root. Checked once, before any prompt.
 */
export function ensureElevated(ops: SystemOperations): Result<void, ProvisionError> {
  if (!ops.isElevated()) return err({ kind: "not_elevated" });
  return ok(undefined);
}
