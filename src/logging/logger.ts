// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Re-export pino's Logger type for convenience. */
export type Logger = pino.Logger;

/**
 * Create a configured pino logger instance.
 *
 * - JSON output (pino default) to `destination`, stdout unless given
 * - Base fields: `service` and `version`
 * - Optional pretty-print via `pino-pretty` transport for interactive use
 */
export function createLogger(
  config: LoggingConfig,
  destination: 1 | 2 = 1,
): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "isbn-ranges",
      version: process.env["APP_VERSION"] ?? "dev",
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service,version",
          destination,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination({ dest: destination, sync: true }));
}
