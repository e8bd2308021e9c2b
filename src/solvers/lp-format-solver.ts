/**
 * LP-format Recording Solver for Model Inspection
 *
 * This solver captures all variables and rows and can produce CPLEX LP
 * format output. Used for analyzing model sizes without actually solving.
 */

import type {
  LinearConstraint,
  MILPSolver,
  ObjectiveDirection,
  SolveResult,
  Term,
  VarRef,
} from "./types";
import { normalizeTerms } from "./types";

interface RecordedVariable {
  name: string;
  binary: boolean;
}

/**
 * A solver that captures the model for LP output.
 * Does not actually solve - only captures the model.
 */
export class LpFormatSolver implements MILPSolver {
  readonly supportsContinuous = true;
  private variables: RecordedVariable[] = [];
  private constraints: LinearConstraint[] = [];
  private objective: { terms: Term[]; direction: ObjectiveDirection } | null = null;

  newBinaryVariable(name?: string): VarRef {
    return this.record(name, true);
  }

  newContinuousVariable(name?: string): VarRef {
    return this.record(name, false);
  }

  addConstraint(constraint: LinearConstraint): void {
    this.constraints.push({ ...constraint, terms: normalizeTerms(constraint.terms) });
  }

  setObjective(terms: Term[], direction: ObjectiveDirection): void {
    this.objective = { terms: normalizeTerms(terms), direction };
  }

  solve(): SolveResult {
    throw new Error("LpFormatSolver records models only; use LpSolver or MiniSatSolver to solve");
  }

  getVariableCount(): number {
    return this.variables.length;
  }

  getConstraintCount(): number {
    return this.constraints.length;
  }

  /**
   * Get all captured rows
   */
  getConstraints(): LinearConstraint[] {
    return this.constraints;
  }

  /**
   * Generate CPLEX LP format string
   */
  toLpFormat(): string {
    const lines: string[] = [];

    lines.push(this.objective?.direction === "minimize" ? "Minimize" : "Maximize");
    lines.push(` obj: ${this.formatTerms(this.objective?.terms ?? [])}`);

    lines.push("Subject To");
    this.constraints.forEach((row, i) => {
      const label = row.name ?? `c${i + 1}`;
      lines.push(` ${label}: ${this.formatTerms(row.terms)} ${row.relation} ${row.rhs}`);
    });

    const continuous = this.variables.filter((v) => !v.binary);
    if (continuous.length > 0) {
      lines.push("Bounds");
      for (const v of continuous) {
        lines.push(` ${v.name} >= 0`);
      }
    }

    const binaries = this.variables.filter((v) => v.binary);
    if (binaries.length > 0) {
      lines.push("Binary");
      lines.push(` ${binaries.map((v) => v.name).join(" ")}`);
    }

    lines.push("End");
    return lines.join("\n");
  }

  /**
   * Get statistics about the model
   */
  getStats(): {
    variables: number;
    binaries: number;
    constraints: number;
    nonzeros: number;
    lpBytes: number;
  } {
    let nonzeros = 0;
    for (const row of this.constraints) {
      nonzeros += row.terms.length;
    }

    return {
      variables: this.variables.length,
      binaries: this.variables.filter((v) => v.binary).length,
      constraints: this.constraints.length,
      nonzeros,
      lpBytes: this.toLpFormat().length,
    };
  }

  private record(name: string | undefined, binary: boolean): VarRef {
    const ref = this.variables.length + 1;
    this.variables.push({ name: name ?? `v${ref}`, binary });
    return ref;
  }

  private formatTerms(terms: Term[]): string {
    if (terms.length === 0) {
      return "0";
    }
    return terms
      .map(([v, coefficient], i) => {
        const name = this.variables[v - 1].name;
        const magnitude = Math.abs(coefficient);
        const scaled = magnitude === 1 ? name : `${magnitude} ${name}`;
        if (i === 0) {
          return coefficient < 0 ? `- ${scaled}` : scaled;
        }
        return coefficient < 0 ? `- ${scaled}` : `+ ${scaled}`;
      })
      .join(" ");
  }
}
