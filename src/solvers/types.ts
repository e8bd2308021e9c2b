/**
 * MILP Solver Abstraction Layer
 *
 * This provides a clean interface for integer programming that can be swapped
 * between different engines (javascript-lp-solver, MiniSat, LP text export).
 */

/**
 * A variable handle. Handles are 1-indexed, in creation order.
 */
export type VarRef = number;

/**
 * One coefficient of a linear expression: [variable, coefficient]
 */
export type Term = [variable: VarRef, coefficient: number];

export type Relation = "<=" | ">=" | "=";

export type ObjectiveDirection = "maximize" | "minimize";

/**
 * A linear row: sum(coefficient * variable) relation rhs
 */
export interface LinearConstraint {
  terms: Term[];
  relation: Relation;
  rhs: number;
  name?: string;
}

/**
 * Result of a solve operation.
 * Values missing from the map are zero.
 */
export type SolveResult =
  | { status: "optimal"; values: Map<VarRef, number> }
  | { status: "infeasible" }
  | { status: "timeout"; values: Map<VarRef, number> | null };

/**
 * Abstract MILP solver interface
 * Implementations can use different underlying engines
 */
export interface MILPSolver {
  /**
   * Whether non-integer variables can be created.
   * Binary-only engines report false.
   */
  readonly supportsContinuous: boolean;

  /**
   * Create a new 0/1 variable and return its handle
   */
  newBinaryVariable(name?: string): VarRef;

  /**
   * Create a new non-negative real variable and return its handle
   */
  newContinuousVariable(name?: string): VarRef;

  /**
   * Add a linear constraint
   */
  addConstraint(constraint: LinearConstraint): void;

  /**
   * Replace the objective. Without one the model is a feasibility problem.
   */
  setObjective(terms: Term[], direction: ObjectiveDirection): void;

  /**
   * Solve the current model. Constraints added after a solve are kept for the
   * next one.
   * @param timeLimitMs Wall-clock budget for this call
   */
  solve(timeLimitMs?: number): SolveResult;

  getVariableCount(): number;

  getConstraintCount(): number;
}

/**
 * Higher-level model builder that works with any MILPSolver
 */
export interface ModelBuilder {
  solver: MILPSolver;

  /**
   * Create named binary variables for easier debugging
   */
  createBinary(name: string): VarRef;

  /**
   * Create named continuous variables (lower bound 0)
   */
  createContinuous(name: string): VarRef;

  /**
   * Add constraint: exactly one of the variables is 1
   */
  addExactlyOne(variables: VarRef[], name?: string): void;

  /**
   * Add constraint: sum(variables) >= bound
   */
  addAtLeast(variables: VarRef[], bound: number, name?: string): void;

  /**
   * Add constraint: sum(variables) <= bound
   */
  addAtMost(variables: VarRef[], bound: number, name?: string): void;

  /**
   * Add implication between binaries: if a then b (a <= b)
   */
  addImplies(a: VarRef, b: VarRef, name?: string): void;

  /**
   * Add `sum(terms) >= rhs` enforced only while `guard` is 1.
   * `bigM` must cover the largest possible shortfall of the row.
   */
  addGuardedAtLeast(guard: VarRef, terms: Term[], rhs: number, bigM: number, name?: string): void;
}

/**
 * Base implementation of ModelBuilder that works with any MILPSolver.
 */
export class BaseModelBuilder implements ModelBuilder {
  solver: MILPSolver;
  private names: Set<string> = new Set();

  constructor(solver: MILPSolver) {
    this.solver = solver;
  }

  createBinary(name: string): VarRef {
    return this.register(name, () => this.solver.newBinaryVariable(name));
  }

  createContinuous(name: string): VarRef {
    return this.register(name, () => this.solver.newContinuousVariable(name));
  }

  addExactlyOne(variables: VarRef[], name?: string): void {
    this.solver.addConstraint({ terms: unitTerms(variables), relation: "=", rhs: 1, name });
  }

  addAtLeast(variables: VarRef[], bound: number, name?: string): void {
    this.solver.addConstraint({ terms: unitTerms(variables), relation: ">=", rhs: bound, name });
  }

  addAtMost(variables: VarRef[], bound: number, name?: string): void {
    this.solver.addConstraint({ terms: unitTerms(variables), relation: "<=", rhs: bound, name });
  }

  addImplies(a: VarRef, b: VarRef, name?: string): void {
    // a → b ≡ b - a >= 0
    this.solver.addConstraint({ terms: [[b, 1], [a, -1]], relation: ">=", rhs: 0, name });
  }

  addGuardedAtLeast(guard: VarRef, terms: Term[], rhs: number, bigM: number, name?: string): void {
    // sum(terms) >= rhs - M(1 - guard)  ≡  sum(terms) - M*guard >= rhs - M
    this.solver.addConstraint({
      terms: [...terms, [guard, -bigM]],
      relation: ">=",
      rhs: rhs - bigM,
      name,
    });
  }

  private register(name: string, create: () => VarRef): VarRef {
    if (this.names.has(name)) {
      throw new Error(`Variable already exists: ${name}`);
    }
    const ref = create();
    this.names.add(name);
    return ref;
  }
}

/**
 * Merge repeated variables and drop zero coefficients
 */
export function normalizeTerms(terms: Term[]): Term[] {
  const merged = new Map<VarRef, number>();
  for (const [variable, coefficient] of terms) {
    merged.set(variable, (merged.get(variable) ?? 0) + coefficient);
  }
  return [...merged].filter(([, coefficient]) => coefficient !== 0);
}

function unitTerms(variables: VarRef[]): Term[] {
  return variables.map((v) => [v, 1]);
}
