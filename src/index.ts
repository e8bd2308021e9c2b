export * from "./problem";
export * from "./solvers";
export { DEFAULT_SOLVE_CONFIG, readEnvConfig, resolveSolveConfig } from "./config";
export type { ConnectivityStrategy, LogLevel, SolveConfig } from "./config";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
