/**
 * Proportional Community Solver
 *
 * This module bridges adjacency-matrix input with the community model.
 * It validates the input, builds the model for one of the four variants,
 * solves it with the provided MILP solver (re-solving with separator cuts
 * when connectivity is enforced lazily), and decodes the result.
 *
 * Each call owns its model; nothing is shared between calls.
 */

import type { ConnectivityStrategy } from "../config";
import { resolveSolveConfig } from "../config";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import type { MILPSolver } from "../solvers";
import { LpSolver } from "../solvers";
import { buildCommunityModel } from "./community-model";
import { addConnectivityCut, findConnectivityCuts } from "./connectivity";
import {
  decodeMembership,
  partitionViolations,
  subgraphViolations,
  toCommunities,
} from "./decoder";
import {
  CutLoopExhaustedError,
  InfeasibleModelError,
  InvalidInputError,
  ModelInconsistencyError,
  SolverTimeoutError,
} from "./errors";
import { Graph } from "./graph";
import type {
  AdjacencyMatrix,
  CommunitySolveOptions,
  KCommunityOptions,
  KCommunityResult,
  MaxCommunityResult,
  ProblemVariant,
  SolveStats,
} from "./graph-types";

const defaultSolver = (): MILPSolver => new LpSolver();

/**
 * Find a partition into k proportional communities of at least two members
 * each (at least one with `generalized`).
 *
 * @throws InvalidInputError for a malformed matrix or k outside 1..n
 * @throws InfeasibleModelError when no such partition exists
 * @throws SolverTimeoutError when the time limit runs out first
 */
export function findKCommunity(
  adjacency: AdjacencyMatrix,
  k: number,
  options: KCommunityOptions = {}
): KCommunityResult {
  return solvePartition(adjacency, k, false, options);
}

/**
 * Like findKCommunity, but every community must induce a connected subgraph.
 */
export function findConnectedKCommunity(
  adjacency: AdjacencyMatrix,
  k: number,
  options: KCommunityOptions = {}
): KCommunityResult {
  return solvePartition(adjacency, k, true, options);
}

/**
 * Find a largest vertex set S, 2 <= |S| <= n-1, in which every member has
 * strictly more neighbors inside S than outside.
 *
 * @throws InfeasibleModelError when no such S exists (always when n < 3)
 */
export function findMaxCommunity(
  adjacency: AdjacencyMatrix,
  options: CommunitySolveOptions = {}
): MaxCommunityResult {
  return solveSubgraph(adjacency, false, options);
}

/**
 * Like findMaxCommunity, but S must induce a connected subgraph.
 */
export function findConnectedMaxCommunity(
  adjacency: AdjacencyMatrix,
  options: CommunitySolveOptions = {}
): MaxCommunityResult {
  return solveSubgraph(adjacency, true, options);
}

function solvePartition(
  adjacency: AdjacencyMatrix,
  k: number,
  connected: boolean,
  options: KCommunityOptions
): KCommunityResult {
  const graph = Graph.fromAdjacency(adjacency);
  const { n } = graph;

  if (!Number.isInteger(k) || k < 1 || k > n) {
    throw new InvalidInputError(`k must be an integer between 1 and ${n}, got ${k}.`);
  }

  const sizeFloor = !(options.generalized ?? false);
  const title = `${connected ? "connected " : ""}${k}-community`;
  if (sizeFloor && 2 * k > n) {
    throw new InfeasibleModelError(
      `No ${title} exists: ${n} vertices cannot fill ${k} communities of at least 2.`
    );
  }

  const variant: ProblemVariant = { family: "partition", k, sizeFloor, connected };
  return runModel(graph, variant, title, options, (groups, stats) => ({
    communities: toCommunities(groups),
    stats,
  }));
}

function solveSubgraph(
  adjacency: AdjacencyMatrix,
  connected: boolean,
  options: CommunitySolveOptions
): MaxCommunityResult {
  const graph = Graph.fromAdjacency(adjacency);
  const title = `${connected ? "connected " : ""}proportional subgraph`;
  if (graph.n < 3) {
    throw new InfeasibleModelError(`No ${title} exists: the graph has fewer than 3 vertices.`);
  }

  const variant: ProblemVariant = { family: "subgraph", connected };
  return runModel(graph, variant, title, options, ([community], stats) => ({
    community,
    size: community.length,
    stats,
  }));
}

/**
 * Choose how connectivity is enforced. Lazy cuts unless flow is asked for;
 * flow needs continuous variables.
 */
function chooseStrategy(
  solver: MILPSolver,
  requested: ConnectivityStrategy | undefined
): ConnectivityStrategy {
  if (requested === "flow" && !solver.supportsContinuous) {
    throw new InvalidInputError(
      "Flow connectivity needs continuous variables; use connectivity: \"cuts\" with this solver."
    );
  }
  return requested ?? "cuts";
}

function violationsOf(graph: Graph, variant: ProblemVariant, groups: number[][]): string[] {
  return variant.family === "partition"
    ? partitionViolations(graph, groups, variant)
    : subgraphViolations(graph, groups[0], variant.connected);
}

/**
 * Build, solve and decode one model. With lazy cuts the solve is repeated,
 * adding separator rows, until every group is connected.
 */
function runModel<T>(
  graph: Graph,
  variant: ProblemVariant,
  title: string,
  options: CommunitySolveOptions,
  shape: (groups: number[][], stats: SolveStats) => T
): T {
  const config = resolveSolveConfig({
    timeLimitMs: options.timeLimitMs,
    maxCutRounds: options.maxCutRounds,
    connectivity: options.connectivity,
  });
  const logger: Logger =
    options.logger ?? createLogger({ component: "community-solver" }, config.logLevel);
  const solver = (options.solver ?? defaultSolver)();
  const strategy = chooseStrategy(solver, config.connectivity);

  const started = Date.now();
  const deadline = config.timeLimitMs === undefined ? undefined : started + config.timeLimitMs;
  const maxRounds = config.maxCutRounds ?? 10 * graph.n + 10;

  const model = buildCommunityModel(graph, variant, solver, strategy);
  const modelStats = {
    variables: solver.getVariableCount(),
    constraints: solver.getConstraintCount(),
  };
  options.onStatsReady?.(modelStats);
  logger.debug({ msg: "Model built", problem: title, n: graph.n, strategy, ...modelStats });

  const statsNow = (solves: number): SolveStats => ({
    variables: solver.getVariableCount(),
    constraints: solver.getConstraintCount(),
    solves,
    elapsedMs: Date.now() - started,
  });

  for (let solves = 1; ; solves++) {
    const remaining = deadline === undefined ? undefined : deadline - Date.now();
    if (remaining !== undefined && remaining <= 0) {
      throw new SolverTimeoutError<T>(`Time limit reached before ${title} was found.`);
    }

    const result = solver.solve(remaining);
    logger.debug({ msg: "Solve finished", problem: title, round: solves, status: result.status });

    if (result.status === "infeasible") {
      logger.info({ msg: "Model infeasible", problem: title, ...statsNow(solves) });
      throw new InfeasibleModelError(`No ${title} exists.`);
    }

    if (result.status === "timeout") {
      let incumbent: T | undefined;
      if (result.values) {
        const groups = decodeMembership(result.values, model.membership);
        if (violationsOf(graph, variant, groups).length === 0) {
          incumbent = shape(groups, statsNow(solves));
        }
      }
      logger.info({
        msg: "Solver timed out",
        problem: title,
        hasIncumbent: incumbent !== undefined,
        ...statsNow(solves),
      });
      throw new SolverTimeoutError<T>(
        `Time limit reached; ${title} ${incumbent ? "is not proven optimal" : "not found"}.`,
        incumbent
      );
    }

    const groups = decodeMembership(result.values, model.membership);

    if (variant.connected && strategy === "cuts") {
      const cuts = findConnectivityCuts(graph, groups);
      if (cuts.length > 0) {
        if (solves >= maxRounds) {
          throw new CutLoopExhaustedError(solves);
        }
        for (const cut of cuts) {
          addConnectivityCut(model.builder, model.membership, cut, solves);
        }
        logger.debug({ msg: "Added connectivity cuts", problem: title, round: solves, cuts: cuts.length });
        continue;
      }
    }

    const violations = violationsOf(graph, variant, groups);
    if (violations.length > 0) {
      logger.error({ msg: "Decoded solution failed validation", problem: title, violations });
      throw new ModelInconsistencyError(violations);
    }

    const stats = statsNow(solves);
    logger.info({ msg: "Solved", problem: title, ...stats });
    return shape(groups, stats);
  }
}
