/**
 * Type declarations for logic-solver npm package
 *
 * This package provides MiniSat compiled to JavaScript via Emscripten.
 * Only the pseudo-boolean subset used by the MiniSat backend is declared.
 */

declare module "logic-solver" {
  namespace Logic {
    const TRUE: string;
    const FALSE: string;

    type Term = string | number | Formula;
    type Formula = object;

    function not(operand: Term): string;
    function or(...operands: Term[]): Formula;
    function implies(operand1: Term, operand2: Term): Formula;

    class Solver {
      constructor();
      getVarNum(variableName: string, noCreate?: boolean): number;
      require(...args: Term[]): void;
      solve(): Solution | null;
      solveAssuming(assumption: Term): Solution | null;
    }

    class Solution {
      getTrueVars(): string[];
      evaluate(expression: Term): boolean;
    }

    class Bits {
      constructor(formulas: Term[]);
    }

    function constantBits(wholeNumber: number): Bits;
    function greaterThanOrEqual(bits1: Bits, bits2: Bits): Formula;
    function weightedSum(formulas: Term[], weights: number[]): Bits;
  }

  export = Logic;
}
