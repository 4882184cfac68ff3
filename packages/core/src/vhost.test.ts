import { describe, expect, test } from "vitest";
import { MockSystemOps } from "./system-ops-mock.js";
import { MockConsoleOutput } from "./console-mock.js";
import { MockPrompter } from "./prompt-mock.js";
import { renderVirtualHost, writeVirtualHost } from "./vhost.js";
import { describeProject } from "./permissions.js";
import { DEFAULT_CONFIG } from "./constants.js";

const BLOG_VHOST = `<VirtualHost *:80>
    ServerAdmin admin@blog.test
    ServerName blog.test
    DocumentRoot "/var/www/blog/public"

    <Directory "/var/www/blog">
        Options Indexes FollowSymLinks
        AllowOverride All
        Require all granted
    </Directory>

    ErrorLog \${APACHE_LOG_DIR}/error.log
    CustomLog \${APACHE_LOG_DIR}/access.log combined
</VirtualHost>
`;

describe("renderVirtualHost", () => {
  test("renders the full block", () => {
    expect(renderVirtualHost("blog", "/var/www/blog")).toBe(BLOG_VHOST);
  });

  test("is deterministic", () => {
    const a = renderVirtualHost("shop", "/home/dev/Projects/shop");
    const b = renderVirtualHost("shop", "/home/dev/Projects/shop");
    expect(a).toBe(b);
  });

  test("document root is the project's public directory", () => {
    const text = renderVirtualHost("shop", "/srv/shop");
    expect(text).toContain('    DocumentRoot "/srv/shop/public"\n');
    expect(text).toContain("    ServerName shop.test\n");
  });

  test("quotes paths that contain spaces", () => {
    const text = renderVirtualHost("shop", "/home/dev/My Projects/shop");
    expect(text).toContain('    DocumentRoot "/home/dev/My Projects/shop/public"\n');
    expect(text).toContain('    <Directory "/home/dev/My Projects/shop">\n');
  });

  test("uses the given tld", () => {
    const text = renderVirtualHost("shop", "/srv/shop", "localhost");
    expect(text).toContain("    ServerName shop.localhost\n");
    expect(text).toContain("    ServerAdmin admin@shop.localhost\n");
  });
});

describe("writeVirtualHost", () => {
  function setup() {
    const ops = new MockSystemOps();
    ops.addDir("/etc/apache2/sites-available");
    const out = new MockConsoleOutput();
    const ctx = { ops, out, prompt: new MockPrompter([]), config: DEFAULT_CONFIG };
    return { ops, out, ctx };
  }

  test("writes <name>.conf into sites-available", async () => {
    const { ops, ctx } = setup();
    const project = describeProject("blog", "/var/www/blog", "/var/www");

    const result = await writeVirtualHost(project, ctx);

    expect(result).toEqual({ ok: true, value: "/etc/apache2/sites-available/blog.conf" });
    expect(ops.fileContent("/etc/apache2/sites-available/blog.conf")).toBe(BLOG_VHOST);
  });

  test("refuses to overwrite an existing file", async () => {
    const { ops, ctx } = setup();
    ops.addFile("/etc/apache2/sites-available/blog.conf", "# hand-written\n");
    const project = describeProject("blog", "/var/www/blog", "/var/www");

    const result = await writeVirtualHost(project, ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      kind: "vhost_write_failed",
      path: "/etc/apache2/sites-available/blog.conf",
      message: "/etc/apache2/sites-available/blog.conf: already exists",
    });
    expect(ops.fileContent("/etc/apache2/sites-available/blog.conf")).toBe("# hand-written\n");
  });

  test("fails when sites-available is missing", async () => {
    const ops = new MockSystemOps();
    const ctx = { ops, out: new MockConsoleOutput(), prompt: new MockPrompter([]), config: DEFAULT_CONFIG };
    const result = await writeVirtualHost(describeProject("blog", "/var/www/blog", "/var/www"), ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("vhost_write_failed");
  });
});
