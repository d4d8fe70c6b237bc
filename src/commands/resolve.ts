/**
 * `sitealias resolve` — show what running a command against an alias means:
 * effective options, local or remote, and the ssh invocation for remote targets.
 */

import type { Command } from "commander";
import { formatOutput, loadCommandEnvironment, parseFormat } from "./common";
import type { OutputFormat } from "./common";
import { parseCommandPath, toCommandLineArgs } from "../alias/options";
import { resolveTarget } from "../alias/site-aliases";
import { buildSshInvocation } from "../alias/transport";
import type { ExecutionTarget, SshInvocation } from "../alias/types";

export const DEFAULT_PROGRAM = "drush";

export interface ResolveReport {
  alias: string;
  command?: string;
  transport: ExecutionTarget["transport"];
  options: ExecutionTarget["options"];
  invocation?: SshInvocation;
}

export function buildResolveReport(
  target: ExecutionTarget,
  commandPath: string[],
  program: string = DEFAULT_PROGRAM,
): ResolveReport {
  const report: ResolveReport = {
    alias: `@${target.record.name}`,
    transport: target.transport,
    options: target.options,
  };
  const commandName = commandPath.join(":");
  if (commandName) report.command = commandName;

  if (target.transport.type === "remote") {
    const remoteArgv = [program, ...toCommandLineArgs(target.options)];
    if (commandName) remoteArgv.push(commandName);
    report.invocation = buildSshInvocation(target.transport.connection, remoteArgv);
  }
  return report;
}

export function registerResolveCommand(program: Command): void {
  program
    .command("resolve <alias> [command...]")
    .description("Resolve an alias for a command (e.g. resolve @stage sql:sync)")
    .option("--format <format>", "yaml or json", parseFormat, "yaml")
    .option("--program <name>", "Program to run on remote hosts", DEFAULT_PROGRAM)
    .action(async (
      alias: string,
      commandTokens: string[],
      opts: { format: OutputFormat; program: string; },
      command: Command,
    ) => {
      const { resolver } = await loadCommandEnvironment(command);
      const commandPath = commandTokens.flatMap(parseCommandPath);
      const target = resolveTarget(resolver, alias, commandPath);
      console.log(formatOutput(buildResolveReport(target, commandPath, opts.program), opts.format));
    });
}
