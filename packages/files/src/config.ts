/**
 * Server configuration from the environment.
 */

import * as z from "zod/v4";

export interface FilesConfig {
  /** Directory relative tool paths resolve against */
  root: string;
}

const EnvSchema = z.object({
  FILEOPS_ROOT: z.string().trim().min(1, "FILEOPS_ROOT must not be empty").optional(),
});

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): FilesConfig {
  const parsed = EnvSchema.parse(env);
  return { root: parsed.FILEOPS_ROOT ?? cwd };
}
