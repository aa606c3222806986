import { RegressionError } from '../errors';

export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

export function assert(condition: unknown, message: string, exitCode = 1): asserts condition {
  if (!condition) {
    throw new CliError(message, exitCode);
  }
}

const EXIT_CODES = {
  INVALID_ARGUMENT: 2,
  SINGULAR_MATRIX: 3,
  DEGENERATE_DATA: 4,
} as const;

/**
 * Wraps a library error as a CliError carrying the exit code for its kind.
 */
export function toCliError(error: RegressionError, context?: string): CliError {
  const message = context ? `${context}: ${error.message}` : error.message;
  return new CliError(message, EXIT_CODES[error.code]);
}
