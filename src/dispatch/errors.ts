/** Base class for every failure an extractor can report. */
export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

/** The update does not classify as the shape a parameter asked for. */
export class ShapeMismatchError extends ExtractionError {
  constructor(
    readonly requested: string,
    readonly actual: string,
  ) {
    super(`Expected ${requested}, got ${actual}`);
    this.name = "ShapeMismatchError";
  }
}

/** A context value a parameter asked for is missing. */
export class ContextValueError extends ExtractionError {
  constructor(readonly key: string) {
    super(`Context has no value for "${key}"`);
    this.name = "ContextValueError";
  }
}

/**
 * A required parameter could not be extracted, so the handler body never
 * ran. Returned to the scheduler as a value.
 */
export class DispatchAbortError extends Error {
  constructor(
    readonly handler: string,
    readonly parameterIndex: number,
    readonly parameterName: string,
    override readonly cause: ExtractionError,
  ) {
    super(`Handler "${handler}" aborted: parameter ${parameterIndex} (${parameterName}): ${cause.message}`);
    this.name = "DispatchAbortError";
  }
}

/** The dispatch signal fired before the body started. `cause` is the abort reason. */
export class DispatchCancelledError extends Error {
  constructor(
    readonly handler: string,
    override readonly cause?: unknown,
  ) {
    super(`Handler "${handler}" cancelled before it ran`);
    this.name = "DispatchCancelledError";
  }
}
