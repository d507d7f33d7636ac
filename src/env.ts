import { z } from "zod";
import { MAX_BIT_WIDTH, MIN_BIT_WIDTH } from "./bits.js";
import { ConfigError } from "./errors.js";

const envSchema = z.object({
  // Path to a table file; the bundled table is used when unset
  LEXICODE_TABLE: z.string().min(1).optional(),
  LEXICODE_BIT_WIDTH: z
    .string()
    .regex(/^\d+$/, "Expected a decimal integer")
    .transform(Number)
    .pipe(z.number().int().min(MIN_BIT_WIDTH).max(MAX_BIT_WIDTH))
    .optional(),
  LEXICODE_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
});

export type EnvVars = z.infer<typeof envSchema>;

/**
 * Read lexicode settings from an environment map.
 *
 * @throws {ConfigError} when a variable is set to an invalid value
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvVars {
  const rawEnv: Record<string, string | undefined> = {};

  for (const key of Object.keys(envSchema.shape)) {
    const value = source[key];
    rawEnv[key] = value === "" ? undefined : value;
  }

  const parsed = envSchema.safeParse(rawEnv);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue.message, issue.path.join("."), { cause: parsed.error });
  }
  return parsed.data;
}
