/**
 * Error codes carried by every {@link RegressionError}.
 * @public
 */
export type RegressionErrorCode = 'INVALID_ARGUMENT' | 'SINGULAR_MATRIX' | 'DEGENERATE_DATA';

/**
 * Base class for failures raised by the regression engine.
 * @public
 */
export abstract class RegressionError extends Error {
  abstract readonly code: RegressionErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised for malformed input: mismatched lengths, wrong coefficient counts,
 * out-of-range indices, non-finite values, incompatible matrix shapes.
 * @public
 */
export class InvalidArgumentError extends RegressionError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Raised when elimination finds no pivot for a column, or when the solution
 * for a column overflows.
 * @public
 */
export class SingularMatrixError extends RegressionError {
  readonly code = 'SINGULAR_MATRIX';
  readonly column: number;

  constructor(column: number, message = `Matrix is singular: no pivot available for column ${column}`) {
    super(message);
    this.column = column;
  }
}

/**
 * Raised when R² is requested for samples whose y values are all equal.
 * @public
 */
export class DegenerateDataError extends RegressionError {
  readonly code = 'DEGENERATE_DATA';

  constructor(message = 'R-squared is undefined: all y values are identical') {
    super(message);
  }
}

export function assertArgument(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvalidArgumentError(message);
  }
}
