/**
 * Alias reference syntax: `@[group.]site[.environment]`, plus `@self` and `@none`.
 */

import { InvalidAliasReferenceError } from "./errors";
import { isBuiltinAlias } from "./registry";
import type { BuiltinAlias } from "./registry";

export const ALIAS_SIGIL = "@";

export type AliasReference =
  | { type: "builtin"; name: BuiltinAlias; }
  | { type: "site"; segments: [string] | [string, string] | [string, string, string]; };

export function stripSigil(reference: string): string {
  return reference.startsWith(ALIAS_SIGIL) ? reference.slice(ALIAS_SIGIL.length) : reference;
}

export function parseAliasReference(reference: string): AliasReference {
  const name = stripSigil(reference.trim());
  if (isBuiltinAlias(name)) return { type: "builtin", name };

  const segments = name.split(".");
  if (segments.some(segment => segment === "")) {
    throw new InvalidAliasReferenceError(reference, "names must not be empty");
  }

  const [first, second, third, ...rest] = segments;
  if (rest.length > 0) {
    throw new InvalidAliasReferenceError(reference, "expected at most group.site.environment");
  }
  if (first === undefined) {
    throw new InvalidAliasReferenceError(reference, "names must not be empty");
  }
  if (second !== undefined && third !== undefined) {
    return { type: "site", segments: [first, second, third] };
  }
  if (second !== undefined) return { type: "site", segments: [first, second] };
  return { type: "site", segments: [first] };
}
