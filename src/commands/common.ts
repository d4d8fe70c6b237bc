/**
 * Shared utilities for sitealias commands.
 * Global option handling and the config → context → aliases bootstrap.
 */

import type { Command } from "commander";
import { stringify } from "yaml";
import { discoverConfig } from "../config/discovery";
import type { ResolvedConfig } from "../config/types";
import { loadSiteAliases } from "../alias/site-aliases";
import type { SiteAliases } from "../alias/site-aliases";
import { createSiteContext } from "../site/context";

export type GlobalOptions = {
  verbose?: boolean;
  config?: string;
  aliasPath?: string[];
  root?: string;
  uri?: string;
};

export type OutputFormat = "yaml" | "json";

/**
 * Commander collect helper — appends each flag value into an array.
 * Pass as the third argument to `.option()` with `[]` as the default.
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

export function parseFormat(value: string): OutputFormat {
  if (value !== "yaml" && value !== "json") {
    throw new Error(`Invalid --format "${value}". Use yaml or json`);
  }
  return value;
}

export function formatOutput(data: unknown, format: OutputFormat): string {
  return format === "json" ? JSON.stringify(data, null, 2) : stringify(data).trimEnd();
}

export interface CommandEnvironment extends SiteAliases {
  config: ResolvedConfig;
}

/**
 * Discover config, detect the site context and load every alias on the
 * search path. --root, --uri and --alias-path take precedence over config.
 */
export async function loadCommandEnvironment(command: Command): Promise<CommandEnvironment> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const config = await discoverConfig({ configPath: globals.config });

  const context = createSiteContext({
    root: globals.root ?? config.root,
    uri: globals.uri ?? config.uri,
    markers: config.rootMarkers,
  });

  const aliases = await loadSiteAliases({
    cliPaths: globals.aliasPath ?? [],
    configPaths: config.aliasPaths,
    context,
  });
  return { ...aliases, config };
}
