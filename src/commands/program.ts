/**
 * Builds the sitealias commander program with its global options.
 */

import { Command } from "commander";
import { registerAliasCommands } from "./alias";
import { collect } from "./common";
import { registerPathCommands } from "./paths";
import { registerResolveCommand } from "./resolve";
import { setVerbose } from "../util/logger";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("sitealias")
    .description("Resolve site aliases into local or remote execution targets")
    .version(VERSION)
    .option("--verbose", "Verbose logging to stderr")
    .option("--config <path>", "Config file to use instead of ./sitealias.yml")
    .option("--alias-path <dir>", "Extra alias directory (repeatable)", collect, [])
    .option("--root <path>", "Site root for @self and site-relative alias directories")
    .option("--uri <uri>", "Site uri for @self")
    .hook("preAction", thisCommand => {
      const opts = thisCommand.opts();
      if (opts.verbose) {
        setVerbose(true);
      }
    });

  registerAliasCommands(program);
  registerResolveCommand(program);
  registerPathCommands(program);

  return program;
}
