/**
 * Alias registry — the flat, read-only namespace of loaded aliases.
 *
 * Built from tiers in search-path priority order. Inside one tier the last
 * record registered under a name wins; across tiers the first tier wins.
 */

import type { AliasTransform, NoneAliasRecord, OptionValue, SiteAliasRecord } from "./types";
import { log, warn } from "../util/logger";

export const BUILTIN_ALIASES = ["self", "none"] as const;
export type BuiltinAlias = typeof BUILTIN_ALIASES[number];

export const NONE_RECORD: NoneAliasRecord = Object.freeze({
  kind: "none",
  name: "none",
  options: {},
});

export function isBuiltinAlias(name: string): name is BuiltinAlias {
  return name === "self" || name === "none";
}

export interface RegistryBuildOptions {
  transforms?: AliasTransform[];
}

function applyTransforms(
  record: SiteAliasRecord,
  transforms: AliasTransform[],
): SiteAliasRecord | null {
  let current: SiteAliasRecord | null = record;
  for (const transform of transforms) {
    if (!current) break;
    current = transform(current);
  }
  return current;
}

function deepFreeze(value: OptionValue): void {
  if (value === null || typeof value !== "object") return;
  for (const child of Object.values(value)) deepFreeze(child);
  Object.freeze(value);
}

/** Stored records are private copies, frozen all the way down. */
function freezeRecord(record: SiteAliasRecord): SiteAliasRecord {
  const options = structuredClone(record.options);
  deepFreeze(options);
  return Object.freeze({ ...record, options });
}

export class AliasRegistry {
  private readonly entries: ReadonlyMap<string, SiteAliasRecord>;

  private constructor(entries: Map<string, SiteAliasRecord>) {
    this.entries = entries;
  }

  static empty(): AliasRegistry {
    return new AliasRegistry(new Map());
  }

  static build(
    tiers: SiteAliasRecord[][],
    options: RegistryBuildOptions = {},
  ): AliasRegistry {
    const transforms = options.transforms ?? [];
    const entries = new Map<string, SiteAliasRecord>();

    for (const tier of tiers) {
      const tierEntries = new Map<string, SiteAliasRecord>();
      for (const loaded of tier) {
        if (isBuiltinAlias(loaded.site)) {
          warn(`Ignoring alias @${loaded.name} from ${loaded.source}: @${loaded.site} is built in`);
          continue;
        }
        const record = applyTransforms(loaded, transforms);
        if (!record) {
          log(`Alias @${loaded.name} dropped by transform`);
          continue;
        }
        tierEntries.set(record.name, record);
      }

      for (const [name, record] of tierEntries) {
        if (entries.has(name)) {
          log(`Alias @${name} from ${record.source} shadowed by a higher priority definition`);
          continue;
        }
        entries.set(name, freezeRecord(record));
      }
    }

    log(`Registered ${entries.size} aliases`);
    return new AliasRegistry(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Look up a fully-qualified name, without sigil. */
  lookup(name: string): SiteAliasRecord | NoneAliasRecord | undefined {
    if (name === "none") return NONE_RECORD;
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return isBuiltinAlias(name) || this.entries.has(name);
  }

  /** All alias names with their sigil, built-ins first. */
  names(): string[] {
    return [
      ...BUILTIN_ALIASES.map(name => `@${name}`),
      ...[...this.entries.keys()].sort().map(name => `@${name}`),
    ];
  }

  records(): SiteAliasRecord[] {
    return [...this.entries.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  groups(): string[] {
    const groups = new Set<string>();
    for (const record of this.entries.values()) {
      if (record.group) groups.add(record.group);
    }
    return [...groups].sort();
  }
}
