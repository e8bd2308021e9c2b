/**
 * Type Definitions for Proportional Community Problems
 *
 * Core types for representing the input graph, problem variants, options
 * and results.
 */

import type { ConnectivityStrategy } from "../config";
import type { Logger } from "../logger";
import type { MILPSolver } from "../solvers";

/**
 * Square 0/1 matrix, symmetric with a zero diagonal.
 * adjacency[u][v] === 1 means u and v are neighbors.
 */
export type AdjacencyMatrix = ReadonlyArray<ReadonlyArray<number>>;

/**
 * Community label (1..k) -> member vertices in ascending order
 */
export type Communities = Record<number, number[]>;

/**
 * Which of the four problem variants a model encodes
 */
export type ProblemVariant =
  | {
      family: "partition";
      /** Number of communities */
      k: number;
      /** Every community needs at least two members (otherwise one) */
      sizeFloor: boolean;
      connected: boolean;
    }
  | {
      family: "subgraph";
      connected: boolean;
    };

/**
 * Model and run statistics
 */
export interface SolveStats {
  variables: number;
  constraints: number;
  /** Number of solver calls (more than one only with lazy cuts) */
  solves: number;
  elapsedMs: number;
}

export interface KCommunityResult {
  communities: Communities;
  stats: SolveStats;
}

export interface MaxCommunityResult {
  /** Selected vertices in ascending order */
  community: number[];
  size: number;
  stats: SolveStats;
}

/**
 * Options shared by all four problem variants
 */
export interface CommunitySolveOptions {
  /** Creates the MILP engine for one call (defaults to javascript-lp-solver) */
  solver?: () => MILPSolver;
  /** Overall wall-clock budget across every solve of the call */
  timeLimitMs?: number;
  /** Connectivity encoding for the connected variants (defaults to lazy cuts) */
  connectivity?: ConnectivityStrategy;
  /** Cap on lazy-cut rounds (defaults to 10n + 10) */
  maxCutRounds?: number;
  logger?: Logger;
  /** Callback to report model size before the first solve */
  onStatsReady?: (stats: { variables: number; constraints: number }) => void;
}

export interface KCommunityOptions extends CommunitySolveOptions {
  /**
   * Lower the floor per community from two members to one. The result still
   * holds exactly k communities.
   */
  generalized?: boolean;
}
