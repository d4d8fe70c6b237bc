/**
 * Diagnostics for sitealias go to stderr so that stdout stays parseable:
 * `list` prints alias names, `show` and `resolve` print YAML or JSON, and
 * scripts pipe those straight into other tools. Scan and load progress is
 * only printed under --verbose; skipped files and bad environments are
 * always reported.
 */

const PREFIX = "sitealias";

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

function emit(tag: string, message: string, args: unknown[]): void {
  console.error(`[${tag}] ${message}`, ...args);
}

/** Progress detail, printed under --verbose. */
export function log(message: string, ...args: unknown[]): void {
  if (verbose) emit(PREFIX, message, args);
}

export function warn(message: string, ...args: unknown[]): void {
  emit(`${PREFIX} WARN`, message, args);
}

export function error(message: string, ...args: unknown[]): void {
  emit(`${PREFIX} ERROR`, message, args);
}
