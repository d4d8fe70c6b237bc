/**
 * Expand ${env.NAME} references in configuration values from process.env.
 * Lookup tries NAME as written, then upper-cased, so `${env.home}` reads HOME.
 */

import { warn } from "./logger";

const ENV_VAR_RE = /\$\{env\.([^}]+)\}/g;

export function lookupEnv(
  name: string,
  env: Record<string, string | undefined> = process.env,
): string | undefined {
  return env[name] ?? env[name.toUpperCase()];
}

export function expandEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return value.replace(ENV_VAR_RE, (_, varName: string) => {
    const resolved = lookupEnv(varName, env);
    if (resolved === undefined) {
      warn(`Environment variable '${varName}' is not set; expanding to an empty string`);
    }
    return resolved ?? "";
  });
}

export function expandEnvList(
  values: string[],
  env: Record<string, string | undefined> = process.env,
): string[] {
  return values.map(value => expandEnvVars(value, env));
}
