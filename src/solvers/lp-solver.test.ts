import { describe, it, expect } from "vitest";
import { LpSolver } from "./lp-solver";
import type { SolveResult } from "./types";

function valuesOf(result: SolveResult): Map<number, number> {
  if (result.status !== "optimal") {
    throw new Error(`expected an optimal result, got ${result.status}`);
  }
  return result.values;
}

describe("LpSolver", () => {
  it("maximizes over binaries", () => {
    const solver = new LpSolver();
    const x = solver.newBinaryVariable();
    const y = solver.newBinaryVariable();
    solver.addConstraint({ terms: [[x, 1], [y, 1]], relation: "<=", rhs: 1 });
    solver.setObjective([[x, 1], [y, 1]], "maximize");

    const values = valuesOf(solver.solve());
    expect((values.get(x) ?? 0) + (values.get(y) ?? 0)).toBeCloseTo(1);
  });

  it("solves feasibility models without an objective", () => {
    const solver = new LpSolver();
    const x = solver.newBinaryVariable();
    const y = solver.newBinaryVariable();
    solver.addConstraint({ terms: [[x, 1], [y, 1]], relation: "=", rhs: 1 });
    solver.addConstraint({ terms: [[x, 1], [y, -1]], relation: ">=", rhs: 1 });

    const values = valuesOf(solver.solve());
    expect(values.get(x) ?? 0).toBeCloseTo(1);
    expect(values.get(y) ?? 0).toBeCloseTo(0);
  });

  it("mixes continuous and binary variables", () => {
    const solver = new LpSolver();
    const x = solver.newBinaryVariable();
    const c = solver.newContinuousVariable();
    solver.addConstraint({ terms: [[c, 1]], relation: "<=", rhs: 2.5 });
    solver.addConstraint({ terms: [[c, 1], [x, -3]], relation: "<=", rhs: 0 });
    solver.setObjective([[c, 1]], "maximize");

    const values = valuesOf(solver.solve());
    expect(values.get(c) ?? 0).toBeCloseTo(2.5);
    expect(values.get(x) ?? 0).toBeCloseTo(1);
  });

  it("reports infeasible models", () => {
    const solver = new LpSolver();
    const x = solver.newBinaryVariable();
    const y = solver.newBinaryVariable();
    solver.addConstraint({ terms: [[x, 1], [y, 1]], relation: ">=", rhs: 3 });
    expect(solver.solve()).toEqual({ status: "infeasible" });
  });

  it("treats a violated row without variables as infeasible", () => {
    const solver = new LpSolver();
    const x = solver.newBinaryVariable();
    solver.addConstraint({ terms: [[x, 1], [x, -1]], relation: ">=", rhs: 1 });
    expect(solver.solve()).toEqual({ status: "infeasible" });
  });

  it("keeps rows added between solves", () => {
    const solver = new LpSolver();
    const x = solver.newBinaryVariable();
    solver.setObjective([[x, 1]], "maximize");
    expect(valuesOf(solver.solve()).get(x) ?? 0).toBeCloseTo(1);

    solver.addConstraint({ terms: [[x, 1]], relation: "<=", rhs: 0 });
    expect(valuesOf(solver.solve()).get(x) ?? 0).toBeCloseTo(0);
    expect(solver.getConstraintCount()).toBe(1);
  });

  it("reports a timeout once the budget is spent", () => {
    const solver = new LpSolver();
    const x = solver.newBinaryVariable();
    const y = solver.newBinaryVariable();
    solver.addConstraint({ terms: [[x, 1], [y, 1]], relation: "<=", rhs: 1 });
    solver.setObjective([[x, 1], [y, 1]], "maximize");

    const result = solver.solve(0);
    expect(result.status).toBe("timeout");
  });

  it("rejects unknown variables", () => {
    const solver = new LpSolver();
    solver.newBinaryVariable();
    expect(() => solver.addConstraint({ terms: [[3, 1]], relation: "<=", rhs: 1 })).toThrow(
      "Unknown variable: 3"
    );
  });
});
