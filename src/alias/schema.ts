/**
 * Zod schemas for validating alias files after YAML parsing.
 */

import { z } from "zod";
import type { OptionMap, OptionValue } from "./types";

export const optionValueSchema: z.ZodType<OptionValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(optionValueSchema),
    z.record(z.string(), optionValueSchema),
  ])
);

export const optionMapSchema: z.ZodType<OptionMap> = z.record(z.string(), optionValueSchema);

const STRING_ATTRIBUTES = ["root", "uri", "host", "user", "ssh-options"] as const;
const MAP_ATTRIBUTES = ["options", "command"] as const;
const OPERATING_SYSTEMS = new Set(["Windows", "Linux"]);

function isStringMap(value: OptionValue): boolean {
  return typeof value === "object"
    && value !== null
    && !Array.isArray(value)
    && Object.values(value).every(v => typeof v === "string");
}

/** Option map for one environment, with the known attributes type-checked. */
export const environmentSchema = optionMapSchema.superRefine((options, ctx) => {
  for (const key of STRING_ATTRIBUTES) {
    const value = options[key];
    if (value !== undefined && typeof value !== "string") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "must be a string" });
    }
  }

  for (const key of MAP_ATTRIBUTES) {
    const value = options[key];
    if (value !== undefined && (typeof value !== "object" || value === null || Array.isArray(value))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "must be a mapping" });
    }
  }

  const os = options.os;
  if (os !== undefined && (typeof os !== "string" || !OPERATING_SYSTEMS.has(os))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["os"], message: "must be Windows or Linux" });
  }

  const paths = options.paths;
  if (paths !== undefined) {
    const valid = Array.isArray(paths) ? paths.every(isStringMap) : isStringMap(paths);
    if (!valid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["paths"],
        message: "must map names to paths",
      });
    }
  }
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
