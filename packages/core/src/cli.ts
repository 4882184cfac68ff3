#!/usr/bin/env node
/**
 * vhostup CLI entry point.
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ZodError } from "zod";
import { LiveConsoleOutput } from "./console-live.js";
import { ReadlinePrompter } from "./prompt-live.js";
import { NodeSystemOps } from "./system-ops-node.js";
import { SetupCommand } from "./cli/setup-command.js";
import { loadConfig } from "./config.js";
import { DEFAULT_CONFIG } from "./constants.js";
import type { HostConfig } from "./types.js";

async function readConfig(path: string | undefined): Promise<HostConfig> {
  if (!path) return DEFAULT_CONFIG;

  const absolute = resolve(path);
  let raw: string;
  try {
    raw = await readFile(absolute, "utf-8");
  } catch {
    throw new Error(`Cannot read config file ${absolute}`);
  }

  try {
    return loadConfig(JSON.parse(raw));
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = e.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new Error(`Invalid config file ${absolute}:\n  ${issues.join("\n  ")}`);
    }
    if (e instanceof SyntaxError) {
      throw new Error(`Invalid JSON in ${absolute}: ${e.message}`);
    }
    throw e;
  }
}

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      readFileSync(new URL("../package.json", import.meta.url), "utf-8"),
    );
    if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
      return String(pkg.version);
    }
  } catch {
    // not shipped alongside the build output
  }
  return "0.0.0";
}

const program = new Command()
  .name("vhostup")
  .description("Set up local Apache virtual hosts for Laravel projects")
  .version(getVersion());

program
  .command("setup", { isDefault: true })
  .description("Configure a virtual host for an existing project, or clone one first")
  .option("-c, --config <file>", "JSON file overriding host paths and identities")
  .action(async (opts: { config?: string }) => {
    const out = new LiveConsoleOutput();
    const prompt = new ReadlinePrompter();
    try {
      const config = await readConfig(opts.config);
      const cmd = new SetupCommand({ ops: new NodeSystemOps(), out, prompt, config });
      process.exitCode = await cmd.execute();
    } catch (e) {
      out.error(e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    } finally {
      prompt.close();
    }
  });

await program.parseAsync();
