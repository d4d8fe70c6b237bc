/**
 * Zod schemas for validating sitealias.yml config files.
 */

import { z } from "zod";

const pathListSchema = z.union([
  z.string().min(1).transform(path => [path]),
  z.array(z.string().min(1)),
]);

const siteSchema = z.object({
  root: z.string().min(1).optional(),
  uri: z.string().min(1).optional(),
  "root-markers": z.array(z.string().min(1)).optional(),
});

export const configFileSchema = z.object({
  paths: z
    .object({
      "alias-path": pathListSchema.optional(),
    })
    .optional(),
  site: siteSchema.optional(),
});

export type ValidatedConfigFile = z.infer<typeof configFileSchema>;

export function validateConfig(data: unknown): ValidatedConfigFile {
  return configFileSchema.parse(data ?? {});
}
