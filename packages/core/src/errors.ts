/**
 * Pipeline Error Types
 *
 * Composition mistakes are caught by the type checker. What remains at run
 * time are precondition violations: arguments a signature cannot rule out.
 */

/** Reason codes carried by every pipeline error. */
export type PipelineErrorCode = "precondition";

/**
 * Base class for all pipeline errors.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    readonly code: PipelineErrorCode,
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

/**
 * Thrown when an operation is called outside its documented input domain.
 */
export class PreconditionError extends PipelineError {
  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Thrown by the seedless `reduce` when the stream has no elements.
 */
export class EmptyReduceError extends PreconditionError {
  constructor() {
    super("reduce", "reduce() of an empty stream with no seed");
    this.name = "EmptyReduceError";
  }
}

/**
 * Thrown by `take` and `skip` for a count that is not a non-negative integer.
 */
export class InvalidCountError extends PreconditionError {
  constructor(
    operation: string,
    readonly count: number,
  ) {
    super(operation, `${operation}() count must be a non-negative integer, got ${count}`);
    this.name = "InvalidCountError";
  }
}

/**
 * Thrown by `range` for bounds or a step that would not produce a finite
 * sequence.
 */
export class InvalidStepError extends PreconditionError {
  constructor(message: string) {
    super("range", message);
    this.name = "InvalidStepError";
  }
}
