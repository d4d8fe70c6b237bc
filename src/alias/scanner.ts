/**
 * Alias search path — which directories are scanned, in which order.
 *
 * Priority (first wins on conflicting alias names):
 * 1. --alias-path <dir> flags
 * 2. paths.alias-path from sitealias.yml
 * 3. Directories beside the detected site root R:
 *    R/drush, R/sites/all/drush, dirname(R)/drush
 *
 * Each entry is followed by its `site-aliases` subdirectory when one exists.
 * Nothing is scanned recursively.
 */

import { readdir, stat } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import type { CandidateFile, SearchPathEntry } from "./types";
import { log, warn } from "../util/logger";

export const SITE_ALIASES_DIR = "site-aliases";

const SITE_CONVENTION_DIRS = [["drush"], ["sites", "all", "drush"]] as const;
const PARENT_CONVENTION_DIR = "drush";

export interface SearchPathOptions {
  cliPaths?: string[];
  configPaths?: string[];
  siteRoot?: string;
  cwd?: string;
}

export function buildSearchPath(options: SearchPathOptions = {}): SearchPathEntry[] {
  const cwd = options.cwd ?? process.cwd();
  const entries: SearchPathEntry[] = [];
  const seen = new Set<string>();

  const add = (dir: string, origin: SearchPathEntry["origin"]): void => {
    const directory = resolve(cwd, dir);
    if (seen.has(directory)) return;
    seen.add(directory);
    entries.push({ directory, origin });
  };

  for (const dir of options.cliPaths ?? []) add(dir, "cli");
  for (const dir of options.configPaths ?? []) add(dir, "config");

  if (options.siteRoot) {
    const root = resolve(cwd, options.siteRoot);
    for (const segments of SITE_CONVENTION_DIRS) add(join(root, ...segments), "site");
    add(join(dirname(root), PARENT_CONVENTION_DIR), "site");
  }

  return entries;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Insert each entry's `site-aliases` subdirectory right after it.
 */
export async function expandSearchPath(entries: SearchPathEntry[]): Promise<SearchPathEntry[]> {
  const subdirs = await Promise.all(
    entries.map(async entry => {
      if (basename(entry.directory) === SITE_ALIASES_DIR) return null;
      const candidate = join(entry.directory, SITE_ALIASES_DIR);
      return (await isDirectory(candidate)) ? candidate : null;
    }),
  );

  const seen = new Set(entries.map(entry => entry.directory));
  const expanded: SearchPathEntry[] = [];
  entries.forEach((entry, index) => {
    expanded.push(entry);
    const subdir = subdirs[index];
    if (subdir && !seen.has(subdir)) {
      seen.add(subdir);
      expanded.push({ directory: subdir, origin: "site-aliases" });
    }
  });
  return expanded;
}

export function isAliasFileName(name: string): boolean {
  return name === "aliases.yml" || name.endsWith(".alias.yml") || name.endsWith(".aliases.yml");
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

async function listAliasFiles(directory: string): Promise<string[]> {
  try {
    const dirents = await readdir(directory, { withFileTypes: true });
    // Symlinks count when they point at a regular file.
    const names = await Promise.all(
      dirents
        .filter(dirent => isAliasFileName(dirent.name))
        .map(async dirent => {
          if (dirent.isFile()) return dirent.name;
          if (dirent.isSymbolicLink() && await isFile(join(directory, dirent.name))) return dirent.name;
          return null;
        }),
    );
    return names.filter((name): name is string => name !== null).sort();
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      log(`Skipping alias directory ${directory}: not found`);
    } else {
      warn(`Cannot read alias directory ${directory}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return [];
  }
}

/**
 * List candidate alias files, ordered by search path priority then file name.
 * Directories are read in parallel.
 */
export async function scanSearchPath(entries: SearchPathEntry[]): Promise<CandidateFile[]> {
  const listings = await Promise.all(entries.map(entry => listAliasFiles(entry.directory)));

  const candidates: CandidateFile[] = [];
  listings.forEach((names, priority) => {
    const directory = entries[priority]?.directory;
    if (directory === undefined) return;
    for (const name of names) {
      candidates.push({ path: join(directory, name), directory, priority });
    }
  });

  log(`Found ${candidates.length} alias files in ${entries.length} search directories`);
  return candidates;
}
