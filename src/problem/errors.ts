/**
 * Error Taxonomy for Community Detection
 *
 * Callers branch on the class (or on `code`):
 * - InvalidInputError: bad matrix or parameter, raised before any model is built
 * - InfeasibleModelError: no valid community structure exists
 * - SolverTimeoutError: budget exhausted, may carry a non-optimal incumbent
 * - ModelInconsistencyError: decoded result failed re-validation (builder defect)
 * - CutLoopExhaustedError: lazy connectivity cuts did not converge
 */

export type CommunityErrorCode =
  | "INVALID_INPUT"
  | "INFEASIBLE"
  | "SOLVER_TIMEOUT"
  | "MODEL_INCONSISTENT"
  | "CUT_LOOP_EXHAUSTED";

/**
 * Base error class for all community detection errors.
 */
export class CommunityError extends Error {
  public readonly code: CommunityErrorCode;
  public readonly cause?: Error;

  constructor(message: string, code: CommunityErrorCode, cause?: Error) {
    super(message);
    this.name = "CommunityError";
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to a plain object for logging/serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause ? { name: this.cause.name, message: this.cause.message } : undefined,
    };
  }
}

export class InvalidInputError extends CommunityError {
  constructor(message: string, cause?: Error) {
    super(message, "INVALID_INPUT", cause);
    this.name = "InvalidInputError";
  }
}

export class InfeasibleModelError extends CommunityError {
  constructor(message: string) {
    super(message, "INFEASIBLE");
    this.name = "InfeasibleModelError";
  }
}

/**
 * The solver ran out of time. `incumbent` is the best valid result found so
 * far, without a proof of optimality, or undefined when there is none.
 */
export class SolverTimeoutError<T = unknown> extends CommunityError {
  public readonly incumbent?: T;

  constructor(message: string, incumbent?: T) {
    super(message, "SOLVER_TIMEOUT");
    this.name = "SolverTimeoutError";
    this.incumbent = incumbent;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), hasIncumbent: this.incumbent !== undefined };
  }
}

export class ModelInconsistencyError extends CommunityError {
  public readonly violations: string[];

  constructor(violations: string[]) {
    super(`Decoded solution violates the model: ${violations.join("; ")}`, "MODEL_INCONSISTENT");
    this.name = "ModelInconsistencyError";
    this.violations = violations;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), violations: this.violations };
  }
}

export class CutLoopExhaustedError extends CommunityError {
  public readonly rounds: number;

  constructor(rounds: number) {
    super(`Connectivity cuts did not converge after ${rounds} rounds`, "CUT_LOOP_EXHAUSTED");
    this.name = "CutLoopExhaustedError";
    this.rounds = rounds;
  }
}
