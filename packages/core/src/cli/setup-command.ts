/**
 * SetupCommand — privilege check, menus, workflow dispatch, and reporting.
 *
 * Exit codes: 0 on success, cancel, or a failed Apache configtest (reported);
 * 1 on any provisioning error.
 */

import type { ConsoleOutput } from "../console.js";
import type { ProvisionContext } from "../context.js";
import type { ProvisionError, Result } from "../types.js";
import type { ProvisionResult } from "../provision.js";
import { ensureElevated } from "../privilege.js";
import { setupExisting, setupFromGit } from "../provision.js";

export const MENUS = {
  projectType: [
    "Select the type of project setup:",
    "1. Laravel",
    "Press any other key to cancel.",
  ],
  action: [
    "Select the action:",
    "1. Setup Virtual Host for existing project",
    "2. Setup new project with git",
    "Press any other key to cancel.",
  ],
} as const;

type Workflow = (ctx: ProvisionContext) => Promise<Result<ProvisionResult, ProvisionError>>;

function workflowFor(action: string | undefined): Workflow | undefined {
  switch (action) {
    case "1":
      return setupExisting;
    case "2":
      return setupFromGit;
    default:
      return undefined;
  }
}

export class SetupCommand {
  private readonly out: ConsoleOutput;

  constructor(private ctx: ProvisionContext) {
    this.out = ctx.out;
  }

  async execute(): Promise<number> {
    const elevated = ensureElevated(this.ctx.ops);
    if (!elevated.ok) {
      this.report(elevated.error);
      return 1;
    }

    const projectType = await this.choose(MENUS.projectType);
    if (projectType !== "1") return this.cancel();

    const action = await this.choose(MENUS.action);
    const workflow = workflowFor(action);
    if (!workflow) return this.cancel();

    const result = await workflow(this.ctx);
    if (!result.ok) {
      this.report(result.error);
      return 1;
    }

    const { activation } = result.value;
    switch (activation.state) {
      case "reloaded":
        this.out.success(`Virtual host setup complete. You can now access ${activation.url}`);
        break;
      case "disabled":
        this.out.warn("Apache configuration test failed. Please check the virtual host file.");
        this.out.info(`  ${activation.confPath}`);
        if (activation.output) this.out.info(activation.output);
        break;
    }
    return 0;
  }

  private async choose(menu: readonly string[]): Promise<string | undefined> {
    const [title, ...options] = menu;
    this.out.heading(title ?? "");
    for (const option of options) this.out.write(option);
    const answer = await this.ctx.prompt.ask("");
    return answer?.trim();
  }

  private cancel(): number {
    this.out.info("Setup canceled.");
    return 0;
  }

  private report(e: ProvisionError): void {
    switch (e.kind) {
      case "not_elevated":
        this.out.error("vhostup must be run as root. Please rerun it with: sudo vhostup");
        break;
      case "validation":
        this.out.error(`${e.message} Aborting.`);
        break;
      case "collision":
        if (e.target === "vhost") {
          const where = `(${e.location})`;
          this.out.error(
            `A virtual host configuration for '${e.name}' already exists ${where}. Aborting.`,
          );
        } else {
          this.out.error(`The hostname '${e.name}' already exists in ${e.location}. Aborting.`);
        }
        break;
      case "installation_failed":
        this.out.error(`Failed to install ${e.package}: ${e.message}`);
        break;
      case "directory_failed":
        this.out.error(`Failed to create ${e.path}: ${e.message}`);
        break;
      case "clone_failed":
        this.out.error("Failed to clone the repository. Aborting.");
        this.out.info(`  ${e.repository} → ${e.destination}: ${e.message}`);
        break;
      case "permissions_failed":
        this.out.error(`Failed to set permissions (${e.step}): ${e.message}`);
        this.out.info("The virtual host was not created.");
        break;
      case "vhost_write_failed":
        this.out.error(`Failed to write virtual host configuration: ${e.message}`);
        break;
      case "activation_failed":
        this.out.error(`Failed to activate the site (${e.step}): ${e.message}`);
        break;
      case "io_error":
        this.out.error(`I/O error: ${e.path}: ${e.message}`);
        break;
    }
  }
}
