/**
 * Transport classification — local records run in place, records with a
 * `host` run through ssh on that host.
 */

import { stringOption } from "./types";
import type {
  AliasRecord,
  ConnectionSpec,
  OperatingSystem,
  SshInvocation,
  Transport,
} from "./types";

export function localOperatingSystem(platform: NodeJS.Platform = process.platform): OperatingSystem {
  return platform === "win32" ? "Windows" : "Linux";
}

function osOption(record: AliasRecord): OperatingSystem | undefined {
  const os = stringOption(record.options, "os");
  return os === "Windows" || os === "Linux" ? os : undefined;
}

export function isRemote(record: AliasRecord): boolean {
  const host = stringOption(record.options, "host");
  return host !== undefined && host.trim() !== "";
}

export function classify(
  record: AliasRecord,
  platform: NodeJS.Platform = process.platform,
): Transport {
  const root = stringOption(record.options, "root");
  const uri = stringOption(record.options, "uri");
  const host = stringOption(record.options, "host")?.trim();

  if (host) {
    const connection: ConnectionSpec = { host, os: osOption(record) ?? "Linux" };
    const user = stringOption(record.options, "user");
    const sshOptions = stringOption(record.options, "ssh-options");
    if (user) connection.user = user;
    if (sshOptions) connection.sshOptions = sshOptions;
    return { type: "remote", root, uri, connection };
  }

  return {
    type: "local",
    root,
    uri,
    os: osOption(record) ?? localOperatingSystem(platform),
    noTarget: record.kind === "none",
  };
}

export function sshTarget(connection: ConnectionSpec): string {
  return connection.user ? `${connection.user}@${connection.host}` : connection.host;
}

/**
 * Quote one argument for the remote shell. Windows arguments follow the
 * CommandLineToArgvW rules: backslashes are doubled only when they precede
 * a quote or the closing quote.
 */
export function quoteArgument(arg: string, os: OperatingSystem): string {
  if (os === "Windows") {
    const escaped = arg
      .replace(/(\\*)"/g, '$1$1\\"')
      .replace(/(\\+)$/, "$1$1");
    return `"${escaped}"`;
  }
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Build the argv for running `remoteArgv` on the connection's host.
 * The remote command travels as a single, quoted argument.
 */
export function buildSshInvocation(
  connection: ConnectionSpec,
  remoteArgv: string[],
): SshInvocation {
  const sshOptions = connection.sshOptions?.split(/\s+/).filter(part => part !== "") ?? [];
  const args = [...sshOptions, sshTarget(connection)];
  if (remoteArgv.length > 0) {
    args.push(remoteArgv.map(arg => quoteArgument(arg, connection.os)).join(" "));
  }
  return { command: "ssh", args };
}
