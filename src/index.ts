/**
 * Programmatic API for sitealias.
 */

export { loadSiteAliases, resolveTarget } from "./alias/site-aliases";
export type { LoadSiteAliasesOptions, SiteAliases } from "./alias/site-aliases";
export {
  buildSearchPath,
  expandSearchPath,
  isAliasFileName,
  scanSearchPath,
  SITE_ALIASES_DIR,
} from "./alias/scanner";
export {
  aliasFileRecords,
  classifyAliasFileName,
  loadAliasFile,
  parseAliasFile,
} from "./alias/loader";
export { AliasRegistry, BUILTIN_ALIASES, NONE_RECORD } from "./alias/registry";
export { AliasResolver } from "./alias/resolver";
export { parseAliasReference } from "./alias/reference";
export type { AliasReference } from "./alias/reference";
export { mergeOptions, parseCommandPath, toCommandLineArgs } from "./alias/options";
export {
  buildSshInvocation,
  classify,
  localOperatingSystem,
} from "./alias/transport";
export { evaluatePathReference, sitePaths } from "./alias/paths";
export type { EvaluatedPath } from "./alias/paths";
export {
  AliasNotFoundError,
  InvalidAliasReferenceError,
  MalformedAliasFileError,
  NoBootstrappedSiteError,
  PathAliasNotFoundError,
  SiteAliasError,
} from "./alias/errors";
export type {
  AliasFile,
  AliasRecord,
  AliasTransform,
  CandidateFile,
  ConnectionSpec,
  ExecutionTarget,
  OptionMap,
  OptionValue,
  SearchPathEntry,
  SiteAliasRecord,
  Transport,
} from "./alias/types";
export { createSiteContext, findSiteRoot } from "./site/context";
export type { SiteContext } from "./site/context";
export { discoverConfig, type DiscoveryOptions } from "./config/discovery";
export { validateConfig } from "./config/schema";
export type { ResolvedConfig } from "./config/types";
export { setVerbose } from "./util/logger";
export { createProgram } from "./commands/program";
