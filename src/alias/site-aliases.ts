/**
 * Alias pipeline: search path → candidate files → parsed files → registry → resolver.
 */

import { aliasFileRecords, loadAliasFile } from "./loader";
import { mergeOptions } from "./options";
import { AliasRegistry } from "./registry";
import { AliasResolver } from "./resolver";
import { buildSearchPath, expandSearchPath, scanSearchPath } from "./scanner";
import { classify } from "./transport";
import type {
  AliasTransform,
  CandidateFile,
  ExecutionTarget,
  SearchPathEntry,
  SiteAliasRecord,
} from "./types";
import type { SiteContext } from "../site/context";

export interface LoadSiteAliasesOptions {
  /** Directories from --alias-path, highest priority. */
  cliPaths?: string[];
  /** Directories from the paths.alias-path config option. */
  configPaths?: string[];
  /** Local site context; its root adds the site-relative search directories. */
  context?: SiteContext | null;
  transforms?: AliasTransform[];
  cwd?: string;
}

export interface SiteAliases {
  searchPath: SearchPathEntry[];
  candidates: CandidateFile[];
  registry: AliasRegistry;
  resolver: AliasResolver;
}

export async function loadSiteAliases(options: LoadSiteAliasesOptions = {}): Promise<SiteAliases> {
  const context = options.context ?? null;
  const searchPath = await expandSearchPath(
    buildSearchPath({
      cliPaths: options.cliPaths,
      configPaths: options.configPaths,
      siteRoot: context?.root,
      cwd: options.cwd,
    }),
  );

  const candidates = await scanSearchPath(searchPath);
  const files = await Promise.all(candidates.map(candidate => loadAliasFile(candidate)));

  // Registration is a single ordered pass over the collected files.
  const tiers: SiteAliasRecord[][] = searchPath.map(() => []);
  files.forEach((file, index) => {
    const candidate = candidates[index];
    if (!file || !candidate) return;
    tiers[candidate.priority]?.push(...aliasFileRecords(file));
  });

  const registry = AliasRegistry.build(tiers, { transforms: options.transforms });
  const resolver = new AliasResolver(registry, context);
  return { searchPath, candidates, registry, resolver };
}

/**
 * Resolve a reference for one command: the record, its effective options and
 * how to reach it.
 */
export function resolveTarget(
  resolver: AliasResolver,
  reference: string,
  commandPath: readonly string[] = [],
  platform: NodeJS.Platform = process.platform,
): ExecutionTarget {
  const record = resolver.resolve(reference);
  return {
    record,
    options: mergeOptions(record, commandPath),
    transport: classify(record, platform),
  };
}
