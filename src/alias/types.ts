/**
 * Site alias types.
 */

export type OptionValue =
  | string
  | number
  | boolean
  | null
  | OptionValue[]
  | { [key: string]: OptionValue; };

export type OptionMap = { [key: string]: OptionValue; };

export const DEFAULT_ENVIRONMENT = "dev";

export type OperatingSystem = "Windows" | "Linux";

// --- Search path ---

export type SearchPathOrigin = "cli" | "config" | "site" | "site-aliases";

export interface SearchPathEntry {
  /** Absolute directory path. */
  directory: string;
  origin: SearchPathOrigin;
}

export interface CandidateFile {
  path: string;
  directory: string;
  /** Index of the search path entry; lower is higher priority. */
  priority: number;
}

// --- Alias files ---

export type EnvironmentMap = Record<string, OptionMap>;
export type SiteMap = Record<string, EnvironmentMap>;

export interface SingleAliasFile {
  kind: "single";
  path: string;
  site: string;
  environments: EnvironmentMap;
}

export interface GroupAliasFile {
  kind: "group";
  path: string;
  group: string;
  sites: SiteMap;
}

export interface UngroupedAliasFile {
  kind: "ungrouped";
  path: string;
  sites: SiteMap;
}

export type AliasFile = SingleAliasFile | GroupAliasFile | UngroupedAliasFile;

export type AliasFileShape =
  | { kind: "single"; site: string; }
  | { kind: "group"; group: string; }
  | { kind: "ungrouped"; };

// --- Records ---

export interface SiteAliasRecord {
  kind: "site";
  /** Fully-qualified name without sigil: `group.site.env` or `site.env`. */
  name: string;
  group?: string;
  site: string;
  environment: string;
  options: OptionMap;
  /** File the record was loaded from. */
  source: string;
}

export interface SelfAliasRecord {
  kind: "self";
  name: "self";
  options: OptionMap;
}

export interface NoneAliasRecord {
  kind: "none";
  name: "none";
  options: OptionMap;
}

export type AliasRecord = SiteAliasRecord | SelfAliasRecord | NoneAliasRecord;

/** Pre-registration hook; returning null drops the record. */
export type AliasTransform = (record: SiteAliasRecord) => SiteAliasRecord | null;

// --- Transport ---

export interface ConnectionSpec {
  host: string;
  user?: string;
  sshOptions?: string;
  os: OperatingSystem;
}

export interface LocalTransport {
  type: "local";
  root?: string;
  uri?: string;
  os: OperatingSystem;
  /** True for `@none`: no application is targeted at all. */
  noTarget: boolean;
}

export interface RemoteTransport {
  type: "remote";
  root?: string;
  uri?: string;
  connection: ConnectionSpec;
}

export type Transport = LocalTransport | RemoteTransport;

export interface SshInvocation {
  command: "ssh";
  args: string[];
}

export interface ExecutionTarget {
  record: AliasRecord;
  options: OptionMap;
  transport: Transport;
}

export function isOptionMap(value: OptionValue | undefined): value is OptionMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringOption(options: OptionMap, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : undefined;
}

export function aliasName(group: string | undefined, site: string, environment: string): string {
  return group ? `${group}.${site}.${environment}` : `${site}.${environment}`;
}
