/**
 * Discover and merge sitealias.yml config files.
 *
 * Precedence (later wins on conflict):
 * 1. $HOME/.sitealias/sitealias.yml (global)
 * 2. sitealias.yml in CWD (project-level)
 * 3. --config <path> (explicit, replaces CWD)
 *
 * Alias paths accumulate: later sources are searched first.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { homedir } from "node:os";
import { parse } from "yaml";
import { validateConfig } from "./schema";
import type { ValidatedConfigFile } from "./schema";
import type { ResolvedConfig } from "./types";
import { expandEnvList, expandEnvVars } from "../util/env";
import { log } from "../util/logger";

export const CONFIG_FILE_NAME = "sitealias.yml";

export function getGlobalConfigPath(): string {
  return join(homedir(), ".sitealias", CONFIG_FILE_NAME);
}

async function loadConfigFile(path: string): Promise<ValidatedConfigFile | null> {
  try {
    const content = await readFile(path, "utf-8");
    const validated = validateConfig(parse(content));
    log(`Loaded config from ${path}`);
    return validated;
  } catch (err) {
    log(
      `Skipping config ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
    return null;
  }
}

export interface DiscoveryOptions {
  configPath?: string;
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export async function discoverConfig(
  options: DiscoveryOptions = {},
): Promise<ResolvedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const resolved: ResolvedConfig = { aliasPaths: [], configSources: [] };

  const sources = [
    getGlobalConfigPath(),
    options.configPath ? resolve(cwd, options.configPath) : join(cwd, CONFIG_FILE_NAME),
  ];

  for (const path of sources) {
    if (!existsSync(path)) continue;
    const loaded = await loadConfigFile(path);
    if (!loaded) continue;
    resolved.configSources.push(path);

    // Relative entries are taken from the config file's directory.
    const base = dirname(path);
    const aliasPaths = expandEnvList(loaded.paths?.["alias-path"] ?? [], env)
      .map(dir => resolve(base, dir));
    resolved.aliasPaths = [...aliasPaths, ...resolved.aliasPaths];

    const site = loaded.site;
    if (site?.root) resolved.root = resolve(base, expandEnvVars(site.root, env));
    if (site?.uri) resolved.uri = expandEnvVars(site.uri, env);
    if (site?.["root-markers"]) resolved.rootMarkers = site["root-markers"];
  }

  log(`Resolved ${resolved.aliasPaths.length} configured alias directories`);
  return resolved;
}
