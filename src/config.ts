/**
 * Solve configuration
 *
 * Provides defaults and environment variable fallbacks for solver settings.
 * Explicit options win over the environment, which wins over the defaults.
 */

import { z } from "zod";
import { InvalidInputError } from "./problem/errors";

export type ConnectivityStrategy = "flow" | "cuts";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface SolveConfig {
  /** Overall wall-clock budget across every solve of one call; undefined = no limit */
  timeLimitMs: number | undefined;
  /** Cap on lazy-cut rounds; undefined = 10n + 10 */
  maxCutRounds: number | undefined;
  /** Connectivity encoding; undefined = lazy cuts */
  connectivity: ConnectivityStrategy | undefined;
  logLevel: LogLevel;
}

/**
 * Default solve configuration values
 */
export const DEFAULT_SOLVE_CONFIG: SolveConfig = {
  timeLimitMs: undefined,
  maxCutRounds: undefined,
  connectivity: undefined,
  logLevel: "info",
};

const envSchema = z.object({
  COMMUNITY_TIME_LIMIT_MS: z.coerce.number().int().positive().optional(),
  COMMUNITY_MAX_CUT_ROUNDS: z.coerce.number().int().positive().optional(),
  COMMUNITY_CONNECTIVITY: z.enum(["flow", "cuts"]).optional(),
  COMMUNITY_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .optional(),
});

const optionsSchema = z.object({
  timeLimitMs: z.number().int().positive().optional(),
  maxCutRounds: z.number().int().positive().optional(),
  connectivity: z.enum(["flow", "cuts"]).optional(),
});

/**
 * Read the COMMUNITY_* variables. Unset or empty variables are ignored.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): z.infer<typeof envSchema> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("COMMUNITY_") && value !== "")
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid environment configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Build a complete solve configuration from partial options
 *
 * @example
 * ```ts
 * const config = resolveSolveConfig({ timeLimitMs: 5_000 });
 * ```
 */
export function resolveSolveConfig(
  options: Partial<Omit<SolveConfig, "logLevel">> = {},
  env: NodeJS.ProcessEnv = process.env
): SolveConfig {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid solve options: ${parsed.error.message}`);
  }
  const fromEnv = readEnvConfig(env);

  return {
    timeLimitMs:
      parsed.data.timeLimitMs ?? fromEnv.COMMUNITY_TIME_LIMIT_MS ?? DEFAULT_SOLVE_CONFIG.timeLimitMs,
    maxCutRounds:
      parsed.data.maxCutRounds ??
      fromEnv.COMMUNITY_MAX_CUT_ROUNDS ??
      DEFAULT_SOLVE_CONFIG.maxCutRounds,
    connectivity:
      parsed.data.connectivity ??
      fromEnv.COMMUNITY_CONNECTIVITY ??
      DEFAULT_SOLVE_CONFIG.connectivity,
    logLevel: fromEnv.COMMUNITY_LOG_LEVEL ?? DEFAULT_SOLVE_CONFIG.logLevel,
  };
}
