/**
 * Alias resolver — turns a reference string into an AliasRecord.
 */

import { AliasNotFoundError, NoBootstrappedSiteError } from "./errors";
import { parseAliasReference } from "./reference";
import { NONE_RECORD } from "./registry";
import type { AliasRegistry } from "./registry";
import { DEFAULT_ENVIRONMENT } from "./types";
import type { AliasRecord, OptionMap, SelfAliasRecord } from "./types";
import type { SiteContext } from "../site/context";

export class AliasResolver {
  private registry: AliasRegistry;
  private context: SiteContext | null;

  constructor(registry: AliasRegistry, context?: SiteContext | null) {
    this.registry = registry;
    this.context = context ?? null;
  }

  /**
   * @throws AliasNotFoundError when nothing matches
   * @throws NoBootstrappedSiteError for `@self` without a site context
   * @throws InvalidAliasReferenceError for malformed references
   */
  resolve(reference: string): AliasRecord {
    const parsed = parseAliasReference(reference);

    if (parsed.type === "builtin") {
      return parsed.name === "self" ? this.resolveSelf() : NONE_RECORD;
    }

    for (const name of candidateNames(parsed.segments)) {
      const record = this.registry.lookup(name);
      if (record && record.kind === "site") return record;
    }
    throw new AliasNotFoundError(reference);
  }

  tryResolve(reference: string): AliasRecord | null {
    try {
      return this.resolve(reference);
    } catch (err) {
      if (err instanceof AliasNotFoundError) return null;
      throw err;
    }
  }

  getAliasNames(): string[] {
    return this.registry.names();
  }

  private resolveSelf(): SelfAliasRecord {
    if (!this.context) throw new NoBootstrappedSiteError();
    const options: OptionMap = { root: this.context.root };
    if (this.context.uri) options.uri = this.context.uri;
    return { kind: "self", name: "self", options };
  }
}

/**
 * Registry names to try, in order. `a.b` is read as site.environment first,
 * then as group.site in the default environment.
 */
function candidateNames(segments: [string] | [string, string] | [string, string, string]): string[] {
  switch (segments.length) {
    case 1:
      return [`${segments[0]}.${DEFAULT_ENVIRONMENT}`];
    case 2:
      return [segments.join("."), `${segments.join(".")}.${DEFAULT_ENVIRONMENT}`];
    case 3:
      return [segments.join(".")];
  }
}
