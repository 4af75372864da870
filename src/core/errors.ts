/**
 * Error types raised by the wavelength analysis.
 *
 * Every error is terminal for the call that raised it; nothing in the core
 * catches and retries.
 */

/**
 * Base error class for all analysis errors.
 */
export class WavelengthAnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WavelengthAnalysisError";
  }
}

/**
 * Error thrown when input validation fails.
 * Contains an array of all validation errors found.
 */
export class ValidationError extends WavelengthAnalysisError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join("; ")}`);
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * Error thrown when a series has too few points to fit a line.
 */
export class InsufficientDataError extends WavelengthAnalysisError {
  readonly pointCount: number;

  constructor(pointCount: number, required = 2) {
    super(`At least ${required} measurement points are required, got ${pointCount}`);
    this.name = "InsufficientDataError";
    this.pointCount = pointCount;
  }
}

/**
 * Error thrown when the data leaves a quantity undefined (a division by zero).
 */
export class DegenerateInputError extends WavelengthAnalysisError {
  readonly reason:
    | "zero_fringe_variance"
    | "zero_slope"
    | "zero_fringe_range"
    | "invalid_path_geometry";

  constructor(message: string, reason: DegenerateInputError["reason"]) {
    super(message);
    this.name = "DegenerateInputError";
    this.reason = reason;
  }
}
