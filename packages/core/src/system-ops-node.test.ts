/**
 * Tests for NodeSystemOps — local tests that don't require root.
 */

import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, rm, mkdir, chmod, readFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { NodeSystemOps } from "./system-ops-node.js";

let root: string;
let ops: NodeSystemOps;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "vhostup-test-"));
  ops = new NodeSystemOps({ HOME: "/home/dev", PATH: join(root, "bin") });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("NodeSystemOps", () => {
  test("homeDir comes from HOME", () => {
    expect(ops.homeDir()).toBe("/home/dev");
  });

  describe("commandExists", () => {
    test("finds executables on PATH", async () => {
      await mkdir(join(root, "bin"));
      await writeFile(join(root, "bin", "setfacl"), "#!/bin/sh\n");
      await chmod(join(root, "bin", "setfacl"), 0o755);

      expect(await ops.commandExists("setfacl")).toEqual({ ok: true, value: true });
      expect(await ops.commandExists("git")).toEqual({ ok: true, value: false });
    });

    test("is false when PATH is empty", async () => {
      const bare = new NodeSystemOps({});
      expect(await bare.commandExists("sh")).toEqual({ ok: true, value: false });
    });
  });

  describe("exec", () => {
    test("returns stdout on success", async () => {
      const result = await ops.exec(process.execPath, ["-e", "process.stdout.write('hi')"]);
      expect(result).toEqual({ ok: true, value: { stdout: "hi", stderr: "" } });
    });

    test("returns exit code and stderr on failure", async () => {
      const result = await ops.exec(process.execPath, [
        "-e",
        "process.stderr.write('bad config'); process.exit(3)",
      ]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.exitCode).toBe(3);
      expect(result.error.message).toBe("bad config");
    });

    test("reports a missing binary with a null exit code", async () => {
      const result = await ops.exec(join(root, "no-such-binary"), []);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.exitCode).toBeNull();
    });
  });

  describe("filesystem", () => {
    test("exists and isDirectory", async () => {
      await writeFile(join(root, "f.txt"), "x");

      expect(await ops.exists(join(root, "f.txt"))).toEqual({ ok: true, value: true });
      expect(await ops.exists(join(root, "nope"))).toEqual({ ok: true, value: false });
      expect(await ops.isDirectory(root)).toEqual({ ok: true, value: true });
      expect(await ops.isDirectory(join(root, "f.txt"))).toEqual({ ok: true, value: false });
      expect(await ops.isDirectory(join(root, "f.txt", "sub"))).toEqual({ ok: true, value: false });
    });

    test("mkdir creates parents", async () => {
      const deep = join(root, "a", "b", "c");
      expect(await ops.mkdir(deep)).toEqual({ ok: true, value: undefined });
      expect(await ops.isDirectory(deep)).toEqual({ ok: true, value: true });
    });

    test("mkdir over a file is an io_error", async () => {
      await writeFile(join(root, "f.txt"), "x");
      const result = await ops.mkdir(join(root, "f.txt"));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("io_error");
    });

    test("readFile maps ENOENT to not_found", async () => {
      const path = join(root, "missing");
      expect(await ops.readFile(path)).toEqual({ ok: false, error: { kind: "not_found", path } });
    });

    test("create never overwrites", async () => {
      const path = join(root, "site.conf");
      expect((await ops.writeFile(path, "first\n", "create")).ok).toBe(true);
      expect(await ops.writeFile(path, "second\n", "create")).toEqual({
        ok: false,
        error: { kind: "already_exists", path },
      });
      expect(await readFile(path, "utf-8")).toBe("first\n");
    });

    test("append extends the file", async () => {
      const path = join(root, "hosts");
      await writeFile(path, "127.0.0.1 localhost\n");
      await ops.writeFile(path, "127.0.0.1   blog.test\n", "append");
      expect(await readFile(path, "utf-8")).toBe("127.0.0.1 localhost\n127.0.0.1   blog.test\n");
    });
  });
});
