import { describe, expect, it } from "vitest";
import { evaluatePathReference, sitePaths } from "../../src/alias/paths.js";
import { AliasRegistry } from "../../src/alias/registry.js";
import { AliasResolver } from "../../src/alias/resolver.js";
import { PathAliasNotFoundError } from "../../src/alias/errors.js";
import type { OptionMap, SiteAliasRecord } from "../../src/alias/types.js";

function record(site: string, environment: string, options: OptionMap): SiteAliasRecord {
  return {
    kind: "site",
    name: `${site}.${environment}`,
    site,
    environment,
    options,
    source: `/aliases/${site}.alias.yml`,
  };
}

const STAGE = record("mysite", "stage", {
  root: "/srv/stage",
  host: "stage.example.com",
  user: "publisher",
  paths: [{ files: "sites/default/files" }, { custom: "/my/custom/path" }],
});

const DEV = record("mysite", "dev", {
  root: "/var/www/mysite",
  paths: { files: "sites/default/files", tmp: "relative/tmp" },
});

const resolver = new AliasResolver(AliasRegistry.build([[STAGE, DEV, record("rootless", "dev", {})]]));

describe("sitePaths", () => {
  it("accepts a list of one-key mappings and resolves from the root", () => {
    expect(sitePaths(STAGE)).toEqual({
      files: "/srv/stage/sites/default/files",
      custom: "/my/custom/path",
    });
  });

  it("accepts a mapping", () => {
    expect(sitePaths(DEV)).toEqual({
      files: "/var/www/mysite/sites/default/files",
      tmp: "/var/www/mysite/relative/tmp",
    });
  });

  it("returns an empty map without paths", () => {
    expect(sitePaths(record("bare", "dev", { root: "/var/www" }))).toEqual({});
  });
});

describe("evaluatePathReference", () => {
  it("expands a named path on a remote alias into an rsync target", () => {
    expect(evaluatePathReference("@mysite.stage:%files/images", resolver)).toEqual({
      record: STAGE,
      path: "/srv/stage/sites/default/files/images",
      remote: true,
      rsyncTarget: "publisher@stage.example.com:/srv/stage/sites/default/files/images",
    });
  });

  it("evaluates a bare alias to its root", () => {
    const evaluated = evaluatePathReference("@mysite", resolver);
    expect(evaluated.path).toBe("/var/www/mysite");
    expect(evaluated.remote).toBe(false);
    expect(evaluated.rsyncTarget).toBe("/var/www/mysite");
  });

  it("joins relative paths to the root and keeps absolute ones", () => {
    expect(evaluatePathReference("@mysite.dev:backups/db.sql", resolver).path).toBe(
      "/var/www/mysite/backups/db.sql",
    );
    expect(evaluatePathReference("@mysite.dev:/tmp/db.sql", resolver).path).toBe("/tmp/db.sql");
  });

  it("throws for an unknown named path", () => {
    expect(() => evaluatePathReference("@mysite.stage:%private", resolver)).toThrow(PathAliasNotFoundError);
    expect(() => evaluatePathReference("@mysite.stage:%private", resolver)).toThrow(
      "@mysite.stage has no path named %private",
    );
  });

  it("throws when a relative path has no root to start from", () => {
    expect(() => evaluatePathReference("@rootless:files", resolver)).toThrow("@rootless.dev has no root");
    expect(() => evaluatePathReference("@none", resolver)).toThrow("@none has no root");
  });
});
