/**
 * Named site paths and `@alias:%name/rest` path references, as used by
 * sync-style commands.
 */

import { isAbsolute, join, posix } from "node:path";
import { PathAliasNotFoundError } from "./errors";
import { stripSigil } from "./reference";
import type { AliasResolver } from "./resolver";
import { classify, isRemote, sshTarget } from "./transport";
import { isOptionMap, stringOption } from "./types";
import type { AliasRecord, OptionValue } from "./types";

export interface EvaluatedPath {
  record: AliasRecord;
  /** Absolute path on the record's machine. */
  path: string;
  remote: boolean;
  /** `user@host:path` for remote records, else `path`. */
  rsyncTarget: string;
}

function collectPaths(value: OptionValue | undefined, into: Record<string, string>): void {
  if (Array.isArray(value)) {
    for (const item of value) collectPaths(item, into);
    return;
  }
  if (!isOptionMap(value)) return;
  for (const [name, path] of Object.entries(value)) {
    if (typeof path === "string") into[name] = path;
  }
}

function joinFromRoot(record: AliasRecord, path: string): string | undefined {
  if (path.startsWith("/") || isAbsolute(path)) return path;
  const root = stringOption(record.options, "root");
  if (!root) return undefined;
  return isRemote(record) ? posix.join(root, path) : join(root, path);
}

/**
 * Named paths of a record. Accepts a mapping or a list of one-key mappings;
 * relative entries are taken from the site root.
 */
export function sitePaths(record: AliasRecord): Record<string, string> {
  const raw: Record<string, string> = {};
  collectPaths(record.options.paths, raw);

  const resolved: Record<string, string> = {};
  for (const [name, path] of Object.entries(raw)) {
    resolved[name] = joinFromRoot(record, path) ?? path;
  }
  return resolved;
}

function splitReference(reference: string): { alias: string; path: string; } {
  const colon = reference.indexOf(":");
  if (colon === -1) return { alias: reference, path: "" };
  return { alias: reference.slice(0, colon), path: reference.slice(colon + 1) };
}

function expandNamedPath(reference: string, record: AliasRecord, path: string): string {
  if (!path.startsWith("%")) return path;

  const slash = path.indexOf("/");
  const name = path.slice(1, slash === -1 ? undefined : slash);
  const rest = slash === -1 ? "" : path.slice(slash);
  const named = sitePaths(record)[name];
  if (named === undefined) {
    throw new PathAliasNotFoundError(reference, `@${record.name} has no path named %${name}`);
  }
  return named + rest;
}

/**
 * Evaluate `@alias:%name/rest`, `@alias:/absolute` or `@alias:relative`.
 * A bare `@alias` evaluates to the site root.
 */
export function evaluatePathReference(reference: string, resolver: AliasResolver): EvaluatedPath {
  const { alias, path: rawPath } = splitReference(stripSigil(reference.trim()));
  const record = resolver.resolve(alias);

  const expanded = expandNamedPath(reference, record, rawPath);
  const path = expanded === "" ? stringOption(record.options, "root") : joinFromRoot(record, expanded);
  if (path === undefined) {
    throw new PathAliasNotFoundError(reference, `@${record.name} has no root`);
  }

  const transport = classify(record);
  const rsyncTarget = transport.type === "remote" ? `${sshTarget(transport.connection)}:${path}` : path;
  return { record, path, remote: transport.type === "remote", rsyncTarget };
}
