/**
 * MILP Solvers Module
 *
 * Clean abstraction for integer programming that allows swapping backends.
 * This module contains the actual solver implementations.
 */

export type {
  LinearConstraint,
  MILPSolver,
  ModelBuilder,
  ObjectiveDirection,
  Relation,
  SolveResult,
  Term,
  VarRef,
} from "./types";
export { BaseModelBuilder, normalizeTerms } from "./types";
export { LpSolver } from "./lp-solver";
export { MiniSatSolver } from "./minisat-solver";
export { LpFormatSolver } from "./lp-format-solver";
