/**
 * Progress reporting for long-running steps.
 *
 * The ticker is a side channel: it shows that a step is running and how it
 * ended, and never changes the step's result.
 */

import type { ConsoleOutput } from "./console.js";
import type { ExecOutput, SystemOperations } from "./system-ops.js";
import type { ExecError, Result } from "./types.js";

/** Run `action` under a progress indicator and return its result unchanged. */
export async function track<T, E>(
  out: ConsoleOutput,
  label: string,
  action: () => Promise<Result<T, E>>,
): Promise<Result<T, E>> {
  const ticker = out.progress(label);
  let succeeded = false;
  try {
    const result = await action();
    succeeded = result.ok;
    return result;
  } finally {
    ticker.stop(succeeded);
  }
}

/** Shorthand: run one process under a progress indicator labelled with its command line. */
export function trackExec(
  ops: SystemOperations,
  out: ConsoleOutput,
  command: string,
  args: readonly string[],
): Promise<Result<ExecOutput, ExecError>> {
  return track(out, [command, ...args].join(" "), () => ops.exec(command, args));
}
