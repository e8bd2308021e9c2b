/**
 * Problem Module
 *
 * Exports the proportional community solvers and related types.
 * This module converts community problems on a graph into integer programs.
 */

// Types
export type {
  AdjacencyMatrix,
  Communities,
  CommunitySolveOptions,
  KCommunityOptions,
  KCommunityResult,
  MaxCommunityResult,
  ProblemVariant,
  SolveStats,
} from "./graph-types";

// Graph adapter
export { Graph } from "./graph";

// Main solvers
export {
  findConnectedKCommunity,
  findConnectedMaxCommunity,
  findKCommunity,
  findMaxCommunity,
} from "./community-solver";

// Model builder (low-level, for inspection with LpFormatSolver)
export { buildCommunityModel, columnLabels, dominanceBigM } from "./community-model";
export type { CommunityModel } from "./community-model";

// Connectivity encodings
export { addConnectivityCut, addFlowConnectivity, findConnectivityCuts } from "./connectivity";
export type { ConnectivityCut } from "./connectivity";

// Validation
export {
  isProportionalPartition,
  isProportionalSubgraph,
  partitionViolations,
  subgraphViolations,
} from "./decoder";
export type { PartitionRules } from "./decoder";

// Errors
export {
  CommunityError,
  CutLoopExhaustedError,
  InfeasibleModelError,
  InvalidInputError,
  ModelInconsistencyError,
  SolverTimeoutError,
} from "./errors";
export type { CommunityErrorCode } from "./errors";
