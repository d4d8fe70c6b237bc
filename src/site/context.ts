/**
 * Local site context — the application root that `@self` stands for.
 */

import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { log } from "../util/logger";

export const DEFAULT_ROOT_MARKERS = ["sites/default"];

export interface SiteContext {
  root: string;
  uri?: string;
}

/**
 * Walk up from `startDir` to the first directory containing every marker.
 */
export function findSiteRoot(
  startDir: string,
  markers: string[] = DEFAULT_ROOT_MARKERS,
): string | null {
  if (markers.length === 0) return null;

  let current = resolve(startDir);
  for (;;) {
    if (markers.every(marker => existsSync(join(current, marker)))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export interface SiteContextOptions {
  /** Explicit --root; skips detection. */
  root?: string;
  uri?: string;
  cwd?: string;
  markers?: string[];
}

export function createSiteContext(options: SiteContextOptions = {}): SiteContext | null {
  const cwd = options.cwd ?? process.cwd();
  const root = options.root
    ? resolve(cwd, options.root)
    : findSiteRoot(cwd, options.markers);

  if (!root) {
    log(`No site root found from ${cwd}`);
    return null;
  }

  log(`Site root: ${root}`);
  return options.uri ? { root, uri: options.uri } : { root };
}
