/**
 * Configuration types for sitealias.yml.
 */

export interface ResolvedConfig {
  /** Alias directories, highest priority first, with ${env.*} expanded. */
  aliasPaths: string[];
  /** Explicit site root; overrides detection from the cwd. */
  root?: string;
  /** Default uri for @self. */
  uri?: string;
  /** Paths that must exist below a directory for it to count as a site root. */
  rootMarkers?: string[];
  /** Config file paths that were successfully loaded (for diagnostics). */
  configSources: string[];
}
