/**
 * Command-scoped option merging.
 *
 * An alias may carry overrides that apply only to one command:
 *
 *   command:
 *     sql:
 *       options: { ... }        applies to `sql` and every `sql:*`
 *       sync:
 *         options:
 *           no-dump: true       applies to `sql:sync` only
 *
 * The command path is passed explicitly; deeper levels win.
 */

import { isOptionMap } from "./types";
import type { AliasRecord, OptionMap, OptionValue } from "./types";

const COMMAND_KEY = "command";
const OPTIONS_KEY = "options";

/** Attributes consumed by the transport layer, never passed as flags. */
const TRANSPORT_KEYS = new Set(["host", "user", "os", "ssh-options", "paths", COMMAND_KEY, OPTIONS_KEY]);

export function parseCommandPath(command: string): string[] {
  return command.split(/[:\s]+/).filter(token => token !== "");
}

/**
 * Effective options for one command. The result is a fresh copy the caller
 * may change; registry records stay untouched.
 */
export function mergeOptions(record: AliasRecord, commandPath: readonly string[]): OptionMap {
  const merged: OptionMap = {};
  for (const [key, value] of Object.entries(record.options)) {
    if (key !== COMMAND_KEY) merged[key] = structuredClone(value);
  }

  let node: OptionValue | undefined = record.options[COMMAND_KEY];
  for (const token of commandPath) {
    if (!isOptionMap(node)) break;
    node = node[token];
    if (!isOptionMap(node)) break;
    const overrides = node[OPTIONS_KEY];
    if (isOptionMap(overrides)) Object.assign(merged, structuredClone(overrides));
  }

  return merged;
}

function flag(key: string, value: OptionValue): string[] {
  if (value === null || value === false) return [];
  if (value === true) return [`--${key}`];
  if (Array.isArray(value)) return value.flatMap(item => flag(key, item));
  if (typeof value === "object") return [`--${key}=${JSON.stringify(value)}`];
  return [`--${key}=${String(value)}`];
}

/**
 * Render merged options as command-line flags: the `options` attribute
 * first, then plain attributes such as `root`, `uri` and command overrides.
 * A key set at both levels is rendered once, with the plain value.
 */
export function toCommandLineArgs(options: OptionMap): string[] {
  const args: string[] = [];
  const plain = Object.keys(options).filter(key => !TRANSPORT_KEYS.has(key));
  const extra = options[OPTIONS_KEY];
  if (isOptionMap(extra)) {
    for (const [key, value] of Object.entries(extra)) {
      if (plain.includes(key)) continue;
      args.push(...flag(key, value));
    }
  }

  for (const key of plain) {
    const value = options[key];
    if (value !== undefined) args.push(...flag(key, value));
  }
  return args;
}
