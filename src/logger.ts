import pino, { type Logger } from "pino";
import { DEFAULT_SOLVE_CONFIG, readEnvConfig } from "./config";
import type { LogLevel } from "./config";

export type { Logger };

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: "proportional-communities",
      level: readEnvConfig().COMMUNITY_LOG_LEVEL ?? DEFAULT_SOLVE_CONFIG.logLevel,
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }
  return rootLogger;
}

/**
 * Create a component logger. Without `level` it inherits the root level,
 * read from COMMUNITY_LOG_LEVEL (default "info") at the first call.
 */
export function createLogger(bindings: { component: string }, level?: LogLevel): Logger {
  const root = getRootLogger();
  return level === undefined ? root.child(bindings) : root.child(bindings, { level });
}
