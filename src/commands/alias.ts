/**
 * `sitealias list` and `sitealias show` — inspect the loaded aliases.
 */

import type { Command } from "commander";
import { formatOutput, loadCommandEnvironment, parseFormat } from "./common";
import type { OutputFormat } from "./common";

export function registerAliasCommands(program: Command): void {
  program
    .command("list")
    .description("List every alias on the search path, built-ins first")
    .option("--group <name>", "Only aliases defined in this group")
    .action(async (opts: { group?: string; }, command: Command) => {
      const { registry } = await loadCommandEnvironment(command);

      const names = opts.group
        ? registry.records()
          .filter(record => record.group === opts.group)
          .map(record => `@${record.name}`)
        : registry.names();

      if (names.length === 0) {
        console.error(opts.group ? `No aliases in group "${opts.group}".` : "No aliases found.");
        return;
      }
      for (const name of names) console.log(name);
    });

  program
    .command("show <alias>")
    .description("Print the options of one alias")
    .option("--format <format>", "yaml or json", parseFormat, "yaml")
    .action(async (alias: string, opts: { format: OutputFormat; }, command: Command) => {
      const { resolver } = await loadCommandEnvironment(command);
      const record = resolver.resolve(alias);
      console.log(formatOutput({ [`@${record.name}`]: record.options }, opts.format));
    });
}
