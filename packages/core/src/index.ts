// Shared primitives
export type {
  HostConfig,
  ProjectDescriptor,
  Dependency,
  // Errors
  ProvisionError,
  InputField,
  PermissionStep,
  ActivationStep,
  FileSystemError,
  NotFoundError,
  AlreadyExistsError,
  PermissionDeniedError,
  IOError,
  ExecError,
} from "./types.js";
export { formatFileSystemError } from "./types.js";

// Result (generic pattern)
export type { Result } from "./result.js";
export { ok, err } from "./result.js";

// Config
export { hostConfigOverrideSchema, parseConfig } from "./schema.js";
export { loadConfig, hostnameFor, vhostPathFor, hostsEntryFor } from "./config.js";
export { DEFAULT_CONFIG, ACL_PACKAGE, GIT_PACKAGE } from "./constants.js";

// System operations
export type { SystemOperations, ExecOutput, WriteMode } from "./system-ops.js";
export { MockSystemOps } from "./system-ops-mock.js";
export type { RecordedOp } from "./system-ops-mock.js";
export { NodeSystemOps } from "./system-ops-node.js";

// Console output + prompts
export type { ConsoleOutput, ProgressTicker } from "./console.js";
export { LiveConsoleOutput } from "./console-live.js";
export type { OutputStream } from "./console-live.js";
export { MockConsoleOutput } from "./console-mock.js";
export type { Prompter } from "./prompt.js";
export { ReadlinePrompter } from "./prompt-live.js";
export { MockPrompter } from "./prompt-mock.js";
export { track, trackExec } from "./progress.js";

// Workflow steps
export type { ProvisionContext } from "./context.js";
export { ensureElevated } from "./privilege.js";
export { ensureInstalled } from "./installer.js";
export type { InstallResult, InstallationError } from "./installer.js";
export {
  expandHome,
  validateProjectName,
  hostsFileMaps,
  readProjectName,
  readExistingPath,
  readCloneDestination,
  readRepositoryUrl,
} from "./input.js";
export { applyPermissions, describeProject, isInsideDefaultRoot } from "./permissions.js";
export { renderVirtualHost, writeVirtualHost } from "./vhost.js";
export { activateSite } from "./activate.js";
export type { ActivationResult } from "./activate.js";

// Workflows
export { setupExisting, setupFromGit } from "./provision.js";
export type { ProvisionResult } from "./provision.js";

// CLI commands
export { SetupCommand } from "./cli/setup-command.js";
