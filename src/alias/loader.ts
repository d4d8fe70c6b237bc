/**
 * Alias file loader — turns one candidate file into a typed AliasFile.
 *
 * File naming decides the shape:
 *   NAME.alias.yml    single site, top-level keys are environments
 *   NAME.aliases.yml  group NAME, sites listed under a `sites` key
 *   aliases.yml       several sites, no group
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { parse } from "yaml";
import { MalformedAliasFileError } from "./errors";
import { environmentSchema, formatIssues } from "./schema";
import { aliasName } from "./types";
import type {
  AliasFile,
  AliasFileShape,
  CandidateFile,
  EnvironmentMap,
  SiteAliasRecord,
  SiteMap,
} from "./types";
import { log, warn } from "../util/logger";

const SINGLE_SUFFIX = ".alias.yml";
const GROUP_SUFFIX = ".aliases.yml";
const UNGROUPED_NAME = "aliases.yml";

export function classifyAliasFileName(path: string): AliasFileShape | null {
  const name = basename(path);
  if (name === UNGROUPED_NAME) return { kind: "ungrouped" };
  if (name.endsWith(GROUP_SUFFIX)) {
    const group = name.slice(0, -GROUP_SUFFIX.length);
    return group ? { kind: "group", group } : null;
  }
  if (name.endsWith(SINGLE_SUFFIX)) {
    const site = name.slice(0, -SINGLE_SUFFIX.length);
    return site ? { kind: "single", site } : null;
  }
  return null;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseYaml(path: string, text: string): unknown {
  try {
    return parse(text);
  } catch (err) {
    throw new MalformedAliasFileError(path, err instanceof Error ? err.message : String(err));
  }
}

function expectMapping(path: string, data: unknown, contents: string): Record<string, unknown> {
  if (!isMapping(data)) throw new MalformedAliasFileError(path, `expected a mapping of ${contents}`);
  return data;
}

/**
 * Validate each environment on its own. An invalid environment is reported
 * and dropped; the rest of the file still loads.
 */
function validateEnvironments(
  path: string,
  group: string | undefined,
  site: string,
  data: Record<string, unknown>,
): EnvironmentMap {
  const environments: EnvironmentMap = {};
  for (const [environment, value] of Object.entries(data)) {
    if (environment === "") {
      warn(`Skipping an environment without a name for site '${site}' in ${path}`);
      continue;
    }
    const result = environmentSchema.safeParse(value);
    if (!result.success) {
      warn(`Skipping @${aliasName(group, site, environment)} in ${path}: ${formatIssues(result.error)}`);
      continue;
    }
    environments[environment] = result.data;
  }
  return environments;
}

function validateSites(path: string, group: string | undefined, data: unknown): SiteMap {
  const sites: SiteMap = {};
  for (const [site, value] of Object.entries(expectMapping(path, data, "sites"))) {
    if (site === "" || !isMapping(value)) {
      warn(`Skipping site '${site}' in ${path}: expected a mapping of environments`);
      continue;
    }
    sites[site] = validateEnvironments(path, group, site, value);
  }
  return sites;
}

/**
 * Parse the text of an alias file.
 * Returns null when the name or content matches no known shape.
 * @throws MalformedAliasFileError on YAML errors or a document that is not a mapping
 */
export function parseAliasFile(path: string, text: string): AliasFile | null {
  const shape = classifyAliasFileName(path);
  if (!shape) return null;

  // An empty document defines nothing.
  const data = parseYaml(path, text) ?? {};

  switch (shape.kind) {
    case "single":
      return {
        kind: "single",
        path,
        site: shape.site,
        environments: validateEnvironments(path, undefined, shape.site, expectMapping(path, data, "environments")),
      };

    case "ungrouped":
      return { kind: "ungrouped", path, sites: validateSites(path, undefined, data) };

    case "group": {
      if (!isMapping(data) || !("sites" in data)) {
        warn(`Skipping ${path}: group alias files must list their sites under a 'sites' key`);
        return null;
      }
      return { kind: "group", path, group: shape.group, sites: validateSites(path, shape.group, data.sites) };
    }
  }
}

/**
 * Read and parse one candidate. Unreadable or malformed files are reported
 * and contribute nothing.
 */
export async function loadAliasFile(candidate: CandidateFile): Promise<AliasFile | null> {
  let text: string;
  try {
    text = await readFile(candidate.path, "utf-8");
  } catch (err) {
    warn(`Cannot read alias file ${candidate.path}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  try {
    const file = parseAliasFile(candidate.path, text);
    if (file) log(`Loaded ${file.kind} alias file ${candidate.path}`);
    return file;
  } catch (err) {
    if (err instanceof MalformedAliasFileError) {
      warn(err.message);
      return null;
    }
    throw err;
  }
}

function environmentRecords(
  path: string,
  group: string | undefined,
  site: string,
  environments: EnvironmentMap,
): SiteAliasRecord[] {
  return Object.entries(environments).map(([environment, options]): SiteAliasRecord => ({
    kind: "site",
    name: aliasName(group, site, environment),
    ...(group ? { group } : {}),
    site,
    environment,
    options,
    source: path,
  }));
}

/** Flatten a file into one record per site environment, in document order. */
export function aliasFileRecords(file: AliasFile): SiteAliasRecord[] {
  switch (file.kind) {
    case "single":
      return environmentRecords(file.path, undefined, file.site, file.environments);
    case "group":
      return Object.entries(file.sites).flatMap(([site, environments]) =>
        environmentRecords(file.path, file.group, site, environments)
      );
    case "ungrouped":
      return Object.entries(file.sites).flatMap(([site, environments]) =>
        environmentRecords(file.path, undefined, site, environments)
      );
  }
}
