/**
 * `sitealias path` and `sitealias search-path`.
 */

import { existsSync } from "node:fs";
import type { Command } from "commander";
import { loadCommandEnvironment } from "./common";
import { evaluatePathReference } from "../alias/paths";

export function registerPathCommands(program: Command): void {
  program
    .command("path <reference>")
    .description("Evaluate a path reference such as @live:%files/images")
    .action(async (reference: string, _opts: unknown, command: Command) => {
      const { resolver } = await loadCommandEnvironment(command);
      console.log(evaluatePathReference(reference, resolver).rsyncTarget);
    });

  program
    .command("search-path")
    .description("List the directories searched for alias files, highest priority first")
    .action(async (_opts: unknown, command: Command) => {
      const { searchPath, candidates } = await loadCommandEnvironment(command);
      for (const entry of searchPath) {
        const found = candidates.filter(candidate => candidate.directory === entry.directory).length;
        const state = existsSync(entry.directory) ? `${found} files` : "missing";
        console.log(`${entry.directory}\t${entry.origin}\t${state}`);
      }
    });
}
