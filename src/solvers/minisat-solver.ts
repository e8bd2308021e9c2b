/**
 * MiniSat-based MILP Solver Implementation
 *
 * Uses the logic-solver npm package which contains MiniSat
 * compiled to JavaScript via Emscripten.
 *
 * Only 0/1 variables and integer coefficients are supported. Each linear row
 * becomes a pseudo-boolean comparison between a weighted sum of literals and a
 * constant. Negative coefficients are moved onto the negated literal:
 *   a*x = a + |a|*(¬x)   for a < 0
 *
 * Optimization is a sequence of SAT calls, each requiring the objective to
 * beat the incumbent by one. The time limit is checked between calls.
 */

import Logic from "logic-solver";
import type {
  LinearConstraint,
  MILPSolver,
  ObjectiveDirection,
  SolveResult,
  Term,
  VarRef,
} from "./types";
import { normalizeTerms } from "./types";

/**
 * Weighted literals with non-negative integer weights
 */
interface PseudoBooleanSum {
  literals: string[];
  weights: number[];
  /** Constant moved out of the sum by the literal flips */
  offset: number;
}

/**
 * Implementation of MILPSolver using logic-solver (MiniSat)
 */
export class MiniSatSolver implements MILPSolver {
  readonly supportsContinuous = false;
  private solver: Logic.Solver;
  private variableCount: number = 0;
  private constraintCount: number = 0;
  private guardCount: number = 0;
  private objective: PseudoBooleanSum | null = null;

  constructor() {
    this.solver = new Logic.Solver();
  }

  newBinaryVariable(): VarRef {
    this.variableCount++;
    // Force the variable to exist in the solver
    this.solver.getVarNum(varName(this.variableCount));
    return this.variableCount;
  }

  newContinuousVariable(): VarRef {
    throw new Error("MiniSat backend only supports binary variables");
  }

  addConstraint(constraint: LinearConstraint): void {
    const terms = this.checkTerms(constraint.terms);
    const { relation, rhs } = constraint;

    if (relation !== "<=") {
      this.solver.require(atLeast(toPseudoBoolean(terms), rhs));
    }
    if (relation !== ">=") {
      const negated: Term[] = terms.map(([v, a]) => [v, -a]);
      this.solver.require(atLeast(toPseudoBoolean(negated), -rhs));
    }
    this.constraintCount++;
  }

  setObjective(terms: Term[], direction: ObjectiveDirection): void {
    const checked = this.checkTerms(terms);
    // Always maximize internally
    const oriented: Term[] =
      direction === "maximize" ? checked : checked.map(([v, a]) => [v, -a]);
    this.objective = toPseudoBoolean(oriented);
  }

  solve(timeLimitMs?: number): SolveResult {
    const deadline = timeLimitMs === undefined ? Infinity : Date.now() + timeLimitMs;

    const first = this.solver.solve();
    if (!first) {
      return { status: "infeasible" };
    }
    if (!this.objective) {
      return { status: "optimal", values: this.readValues(first) };
    }

    const objective = this.objective;
    let best = first;
    for (;;) {
      if (Date.now() >= deadline) {
        return { status: "timeout", values: this.readValues(best) };
      }

      // guard → objective >= incumbent + 1
      const guard = `bound${++this.guardCount}`;
      const target = weightOf(objective, new Set(best.getTrueVars())) + 1;
      this.solver.require(Logic.implies(guard, atLeast(objective, target + objective.offset)));

      const next = this.solver.solveAssuming(guard);
      if (!next) {
        return { status: "optimal", values: this.readValues(best) };
      }
      best = next;
    }
  }

  getVariableCount(): number {
    return this.variableCount;
  }

  getConstraintCount(): number {
    return this.constraintCount;
  }

  private checkTerms(terms: Term[]): Term[] {
    for (const [v, coefficient] of terms) {
      if (v < 1 || v > this.variableCount) {
        throw new Error(`Unknown variable: ${v}`);
      }
      if (!Number.isInteger(coefficient)) {
        throw new Error(`MiniSat backend needs integer coefficients, got ${coefficient}`);
      }
    }
    return normalizeTerms(terms);
  }

  private readValues(solution: Logic.Solution): Map<VarRef, number> {
    const trueVars = new Set(solution.getTrueVars());
    const values = new Map<VarRef, number>();
    for (let i = 1; i <= this.variableCount; i++) {
      values.set(i, trueVars.has(varName(i)) ? 1 : 0);
    }
    return values;
  }
}

function varName(v: VarRef): string {
  return `x${v}`;
}

function toPseudoBoolean(terms: Term[]): PseudoBooleanSum {
  const literals: string[] = [];
  const weights: number[] = [];
  let offset = 0;
  for (const [v, a] of terms) {
    if (a > 0) {
      literals.push(varName(v));
      weights.push(a);
    } else {
      literals.push(`-${varName(v)}`);
      weights.push(-a);
      offset += a;
    }
  }
  return { literals, weights, offset };
}

/**
 * Formula for: offset + sum(weights * literals) >= rhs
 */
function atLeast(sum: PseudoBooleanSum, rhs: number): Logic.Term {
  const bound = Math.ceil(rhs - sum.offset);
  if (bound <= 0) {
    return Logic.TRUE;
  }
  const total = sum.weights.reduce((acc, w) => acc + w, 0);
  if (total < bound) {
    return Logic.FALSE;
  }
  return Logic.greaterThanOrEqual(
    Logic.weightedSum(sum.literals, sum.weights),
    Logic.constantBits(bound)
  );
}

/**
 * Value of sum(weights * literals), without the offset
 */
function weightOf(sum: PseudoBooleanSum, trueVars: Set<string>): number {
  let total = 0;
  sum.literals.forEach((literal, i) => {
    const negated = literal.startsWith("-");
    const isTrue = trueVars.has(negated ? literal.slice(1) : literal);
    if (isTrue !== negated) {
      total += sum.weights[i];
    }
  });
  return total;
}
