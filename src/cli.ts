#!/usr/bin/env node
/**
 * sitealias — resolve site aliases into local or remote targets
 *
 * Usage:
 *   sitealias list [--group <name>]          List aliases on the search path
 *   sitealias show <alias>                    Print an alias's options
 *   sitealias resolve <alias> [command...]    Effective options and transport
 *   sitealias path <reference>                Evaluate @alias:%name/path
 *   sitealias search-path                     Show the alias search path
 */

import { config } from "dotenv";
import { createProgram } from "./commands/program";
import { error as logError } from "./util/logger";

// Load environment variables from .env.local and .env
config({ path: ".env.local", quiet: true });
config({ path: ".env", quiet: true });

async function main(): Promise<void> {
  await createProgram().parseAsync();
}

main().catch(err => {
  logError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
