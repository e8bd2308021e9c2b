/**
 * Type declarations for javascript-lp-solver npm package
 *
 * Simplex with branch-and-cut for integer variables, written in plain JavaScript.
 */

declare module "javascript-lp-solver" {
  namespace solver {
    interface ConstraintBound {
      min?: number;
      max?: number;
      equal?: number;
    }

    interface Model {
      optimize: string;
      opType: "max" | "min";
      constraints: Record<string, ConstraintBound>;
      /** variable name -> (constraint or objective name -> coefficient) */
      variables: Record<string, Record<string, number>>;
      ints?: Record<string, 1>;
      binaries?: Record<string, 1>;
      options?: {
        timeout?: number;
        tolerance?: number;
        exitOnCycles?: boolean;
      };
    }

    /** Variables at zero are omitted from the result. */
    interface Solution {
      feasible: boolean;
      result: number;
      bounded: boolean;
      [variable: string]: number | boolean | undefined;
    }

    function Solve(model: Model, precision?: number, full?: boolean): Solution;
  }

  export = solver;
}
