import type { ConsoleOutput } from "./console.js";
import type { Prompter } from "./prompt.js";
import type { SystemOperations } from "./system-ops.js";
import type { HostConfig } from "./types.js";

/** Everything a workflow step needs, passed explicitly */
export type ProvisionContext = {
  ops: SystemOperations;
  out: ConsoleOutput;
  prompt: Prompter;
  config: HostConfig;
};
