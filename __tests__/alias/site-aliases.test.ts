import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadSiteAliases, resolveTarget } from "../../src/alias/site-aliases.js";
import { isOptionMap } from "../../src/alias/types.js";

async function writeAliasFile(dir: string, name: string, content: string): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, name), content);
}

describe("loadSiteAliases", () => {
  let tempDir: string;
  let cliDir: string;
  let configDir: string;
  let webRoot: string;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "sitealias-pipeline-"));
    cliDir = join(tempDir, "cli");
    configDir = join(tempDir, "config");
    webRoot = join(tempDir, "project", "web");
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    await writeAliasFile(cliDir, "example.alias.yml", "dev:\n  root: /from/cli\n");
    await writeAliasFile(
      configDir,
      "example.alias.yml",
      [
        "dev:",
        "  root: /from/config",
        "live:",
        "  host: live.example.com",
        "  user: deploy",
        "  root: /srv/example",
        "  uri: https://example.com",
        "  command:",
        "    sql:",
        "      sync:",
        "        options:",
        "          no-dump: true",
        "",
      ].join("\n"),
    );
    await writeAliasFile(
      configDir,
      "elements.aliases.yml",
      [
        "sites:",
        "  earth:",
        "    dev: { root: /path/to/earth }",
        "    live: { root: /other/path/to/earth }",
        "  wind:",
        "    dev: { root: /path/to/wind }",
        "    live: { root: /other/path/to/wind }",
        "",
      ].join("\n"),
    );
    await writeAliasFile(configDir, "broken.alias.yml", "dev: [unclosed\n");
    await writeAliasFile(join(webRoot, "drush", "site-aliases"), "local.alias.yml", "dev:\n  root: /from/site-aliases\n");
    await writeAliasFile(join(tempDir, "project", "drush"), "aliases.yml", "shared:\n  test:\n    root: /from/parent\n");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  function load() {
    return loadSiteAliases({
      cliPaths: [cliDir, join(tempDir, "missing")],
      configPaths: [configDir],
      context: { root: webRoot, uri: "https://local.test" },
    });
  }

  it("builds the search path in priority order", async () => {
    const { searchPath } = await load();
    expect(searchPath).toEqual([
      { directory: cliDir, origin: "cli" },
      { directory: join(tempDir, "missing"), origin: "cli" },
      { directory: configDir, origin: "config" },
      { directory: join(webRoot, "drush"), origin: "site" },
      { directory: join(webRoot, "drush", "site-aliases"), origin: "site-aliases" },
      { directory: join(webRoot, "sites", "all", "drush"), origin: "site" },
      { directory: join(tempDir, "project", "drush"), origin: "site" },
    ]);
  });

  it("registers aliases from every search directory", async () => {
    const { registry } = await load();
    expect(registry.names()).toEqual([
      "@self",
      "@none",
      "@elements.earth.dev",
      "@elements.earth.live",
      "@elements.wind.dev",
      "@elements.wind.live",
      "@example.dev",
      "@example.live",
      "@local.dev",
      "@shared.test",
    ]);
  });

  it("lets the higher priority directory win", async () => {
    const { resolver } = await load();
    expect(resolver.resolve("@example").options).toEqual({ root: "/from/cli" });
  });

  it("skips a malformed file with a warning", async () => {
    const { registry } = await load();
    expect(registry.has("broken.dev")).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Malformed alias file ${join(configDir, "broken.alias.yml")}`),
    );
  });

  it("registers an alias file symlinked into a search directory", async () => {
    const shared = join(tempDir, "shared");
    const linked = join(tempDir, "linked");
    await writeAliasFile(shared, "example.alias.yml", "dev:\n  root: /from/shared\n");
    await mkdir(linked);
    await symlink(join(shared, "example.alias.yml"), join(linked, "example.alias.yml"));

    const { registry } = await loadSiteAliases({ configPaths: [linked] });
    expect(registry.has("example.dev")).toBe(true);
    expect(registry.lookup("example.dev")?.options).toEqual({ root: "/from/shared" });
  });

  it("keeps the valid environments of a file with one invalid environment", async () => {
    const groupDir = join(tempDir, "groups");
    await writeAliasFile(
      groupDir,
      "fleet.aliases.yml",
      "sites:\n  a:\n    dev: { root: /a }\n    live: { host: a.example.com, os: linux }\n  b:\n    dev: { root: /b }\n",
    );

    const { registry } = await loadSiteAliases({ configPaths: [groupDir] });
    expect(registry.names()).toEqual(["@self", "@none", "@fleet.a.dev", "@fleet.b.dev"]);
  });

  it("resolves @self from the context", async () => {
    const { resolver } = await load();
    expect(resolver.resolve("@self").options).toEqual({ root: webRoot, uri: "https://local.test" });
  });

  it("applies transforms", async () => {
    const { registry } = await loadSiteAliases({
      configPaths: [configDir],
      transforms: [record => (record.group === "elements" ? null : record)],
    });
    expect(registry.groups()).toEqual([]);
    expect(registry.has("example.live")).toBe(true);
  });

  describe("resolveTarget", () => {
    it("merges command options and classifies a remote alias", async () => {
      const { resolver } = await load();
      const target = resolveTarget(resolver, "@example.live", ["sql", "sync"], "linux");
      expect(target.options).toEqual({
        host: "live.example.com",
        user: "deploy",
        root: "/srv/example",
        uri: "https://example.com",
        "no-dump": true,
      });
      expect(target.transport).toEqual({
        type: "remote",
        root: "/srv/example",
        uri: "https://example.com",
        connection: { host: "live.example.com", user: "deploy", os: "Linux" },
      });
    });

    it("hands out options that can be changed without affecting later resolves", async () => {
      const optionsDir = join(tempDir, "with-options");
      await writeAliasFile(optionsDir, "a.alias.yml", "dev:\n  root: /a\n  options:\n    verbose: true\n");
      const { resolver } = await loadSiteAliases({ configPaths: [optionsDir] });

      const first = resolveTarget(resolver, "@a", [], "linux").options.options;
      if (!isOptionMap(first)) throw new Error("expected an options map");
      first.injected = "yes";

      expect(resolveTarget(resolver, "@a", [], "linux").options.options).toEqual({ verbose: true });
    });

    it("classifies @none as local without target", async () => {
      const { resolver } = await load();
      const target = resolveTarget(resolver, "@none", ["status"], "linux");
      expect(target.options).toEqual({});
      expect(target.transport).toEqual({ type: "local", os: "Linux", noTarget: true });
    });
  });
});
