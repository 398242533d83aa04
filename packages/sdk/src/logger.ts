import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

/**
 * Root logger. Writes to stderr so the stdio MCP transport keeps stdout
 * for protocol frames.
 */
export const logger: Logger = pino(
  {
    name: "seobridge",
    level: process.env.LOG_LEVEL || "info",
  },
  pino.destination({ dest: 2, sync: true }),
);

/** Child logger bound to a module name */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
