/**
 * javascript-lp-solver based MILP Solver Implementation
 *
 * Uses the javascript-lp-solver npm package (simplex + branch-and-cut).
 * The model is kept in our own row format and translated to the package's
 * JSON model on every solve, so rows may be added between solves.
 */

import lpSolver from "javascript-lp-solver";
import type {
  LinearConstraint,
  MILPSolver,
  ObjectiveDirection,
  SolveResult,
  Term,
  VarRef,
} from "./types";
import { normalizeTerms } from "./types";

const OBJECTIVE_KEY = "__objective";

/**
 * Implementation of MILPSolver using javascript-lp-solver
 */
export class LpSolver implements MILPSolver {
  readonly supportsContinuous = true;
  private binaries: Set<VarRef> = new Set();
  private variableCount: number = 0;
  private constraints: LinearConstraint[] = [];
  private objective: { terms: Term[]; direction: ObjectiveDirection } | null = null;
  /** Set when a row without variables can never hold, e.g. 0 >= 1 */
  private contradiction: boolean = false;

  newBinaryVariable(): VarRef {
    this.variableCount++;
    this.binaries.add(this.variableCount);
    return this.variableCount;
  }

  newContinuousVariable(): VarRef {
    this.variableCount++;
    return this.variableCount;
  }

  addConstraint(constraint: LinearConstraint): void {
    for (const [v] of constraint.terms) {
      if (v < 1 || v > this.variableCount) {
        throw new Error(`Unknown variable: ${v}`);
      }
    }
    const terms = normalizeTerms(constraint.terms);
    if (terms.length === 0) {
      this.contradiction ||= !holdsAtZero(constraint);
    }
    this.constraints.push({ ...constraint, terms });
  }

  setObjective(terms: Term[], direction: ObjectiveDirection): void {
    this.objective = { terms: normalizeTerms(terms), direction };
  }

  solve(timeLimitMs?: number): SolveResult {
    if (this.contradiction) {
      return { status: "infeasible" };
    }
    const model = this.toModel(timeLimitMs);
    const started = Date.now();
    const raw = lpSolver.Solve(model);
    const timedOut = timeLimitMs !== undefined && Date.now() - started >= timeLimitMs;

    if (!raw.feasible) {
      return timedOut ? { status: "timeout", values: null } : { status: "infeasible" };
    }
    if (!raw.bounded) {
      throw new Error("Model is unbounded");
    }

    const values = new Map<VarRef, number>();
    for (let i = 1; i <= this.variableCount; i++) {
      const value = raw[varName(i)];
      if (typeof value === "number") {
        values.set(i, value);
      }
    }

    if (timedOut) {
      return { status: "timeout", values };
    }
    return { status: "optimal", values };
  }

  getVariableCount(): number {
    return this.variableCount;
  }

  getConstraintCount(): number {
    return this.constraints.length;
  }

  /**
   * Build the package's JSON model. Binaries become integer variables with
   * an explicit `<= 1` row each.
   */
  private toModel(timeLimitMs?: number): lpSolver.Model {
    const variables: Record<string, Record<string, number>> = {};
    for (let i = 1; i <= this.variableCount; i++) {
      variables[varName(i)] = {};
    }

    const constraints: Record<string, lpSolver.ConstraintBound> = {};
    this.constraints.forEach((row, index) => {
      const key = `r${index + 1}`;
      constraints[key] = boundOf(row);
      for (const [v, coefficient] of row.terms) {
        variables[varName(v)][key] = coefficient;
      }
    });

    const ints: Record<string, 1> = {};
    for (const v of this.binaries) {
      const name = varName(v);
      const key = `ub_${name}`;
      constraints[key] = { max: 1 };
      variables[name][key] = 1;
      ints[name] = 1;
    }

    for (const [v, coefficient] of this.objective?.terms ?? []) {
      variables[varName(v)][OBJECTIVE_KEY] = coefficient;
    }

    return {
      optimize: OBJECTIVE_KEY,
      opType: this.objective?.direction === "minimize" ? "min" : "max",
      constraints,
      variables,
      ints,
      ...(timeLimitMs !== undefined && { options: { timeout: timeLimitMs } }),
    };
  }
}

function varName(v: VarRef): string {
  return `v${v}`;
}

function holdsAtZero(row: LinearConstraint): boolean {
  switch (row.relation) {
    case "<=":
      return 0 <= row.rhs;
    case ">=":
      return 0 >= row.rhs;
    case "=":
      return row.rhs === 0;
  }
}

function boundOf(row: LinearConstraint): lpSolver.ConstraintBound {
  switch (row.relation) {
    case "<=":
      return { max: row.rhs };
    case ">=":
      return { min: row.rhs };
    case "=":
      return { equal: row.rhs };
  }
}
