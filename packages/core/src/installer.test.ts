import { describe, expect, test } from "vitest";
import { MockSystemOps } from "./system-ops-mock.js";
import { MockConsoleOutput } from "./console-mock.js";
import { ensureInstalled } from "./installer.js";
import { ACL_PACKAGE, GIT_PACKAGE } from "./constants.js";

function setup() {
  const ops = new MockSystemOps();
  const out = new MockConsoleOutput();
  return { ops, out, ctx: { ops, out } };
}

describe("ensureInstalled", () => {
  test("is a no-op when the command is already on PATH", async () => {
    const { ops, out, ctx } = setup();
    ops.addCommand("git");

    const result = await ensureInstalled(GIT_PACKAGE, ctx);

    expect(result).toEqual({ ok: true, value: { installed: false } });
    expect(ops.ops).toEqual([]);
    expect(out.textsAt("info")).toEqual(["git is already installed."]);
  });

  test("refreshes the index, installs, and re-checks", async () => {
    const { ops, out, ctx } = setup();
    ops.onExec("apt-get install -y acl", () => ops.addCommand("setfacl"));

    const result = await ensureInstalled(ACL_PACKAGE, ctx);

    expect(result).toEqual({ ok: true, value: { installed: true } });
    expect(ops.execLog()).toEqual(["apt-get update", "apt-get install -y acl"]);
    expect(out.textsAt("progress")).toEqual(["✔ apt-get update", "✔ apt-get install -y acl"]);
  });

  test("fails when the index refresh fails, without installing", async () => {
    const { ops, ctx } = setup();
    ops.failExec("apt-get update", 100, "network unreachable");

    const result = await ensureInstalled(ACL_PACKAGE, ctx);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "installation_failed",
        package: "acl",
        message: "package index refresh failed: network unreachable",
      },
    });
    expect(ops.execLog()).toEqual(["apt-get update"]);
  });

  test("fails when the install exits non-zero", async () => {
    const { ops, out, ctx } = setup();
    ops.failExec("apt-get install -y git", 100, "E: Unable to locate package git");

    const result = await ensureInstalled(GIT_PACKAGE, ctx);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "installation_failed",
        package: "git",
        message: "E: Unable to locate package git",
      },
    });
    expect(out.textsAt("progress")).toEqual(["✔ apt-get update", "✗ apt-get install -y git"]);
  });

  test("fails when the command is still missing after a clean install", async () => {
    const { ctx } = setup();

    const result = await ensureInstalled(ACL_PACKAGE, ctx);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "installation_failed",
        package: "acl",
        message: "setfacl still not found after installing acl",
      },
    });
  });
});
