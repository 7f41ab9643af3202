// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const EnvSchema = z.object({
  ISBN_RANGE_FILE: z.string().optional(),
  ISBN_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
  ISBN_LOG_PRETTY: z.enum(["0", "1", "true", "false"]).default("false"),
});

/**
 * Load the configuration from environment variables.
 *
 * Every setting has a default except the range file, which only the parse
 * mode of the CLI needs.
 *
 * @throws ConfigurationError when a variable has an unsupported value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`, {
      cause: parsed.error,
    });
  }

  const vars = parsed.data;
  const rangeFile = vars.ISBN_RANGE_FILE?.trim();

  return {
    rangeFile: rangeFile ? rangeFile : null,
    logging: {
      level: vars.ISBN_LOG_LEVEL,
      prettyPrint: vars.ISBN_LOG_PRETTY === "1" || vars.ISBN_LOG_PRETTY === "true",
    },
  };
}
