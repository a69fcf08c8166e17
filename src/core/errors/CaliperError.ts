/**
 * Core error handling system for Caliper
 *
 * Every failure the pipeline surfaces is a CaliperError with:
 * - A structured error code naming the failure category
 * - A context object naming the offending column, metric or stage
 * - A proper stack trace
 */

/**
 * Error codes covering every surfaced failure in the pipeline
 */
export enum ErrorCode {
  // Schema errors
  MISSING_COLUMN = 'MISSING_COLUMN',

  // Data errors
  INVALID_DATA = 'INVALID_DATA',
  INVALID_PARTITION = 'INVALID_PARTITION',
  DIVISION_BY_ZERO_METRIC = 'DIVISION_BY_ZERO_METRIC',

  // User errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Batch errors
  PIPELINE_ABORTED = 'PIPELINE_ABORTED',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Context attached to an error. Values must be JSON-serializable.
 */
export type ErrorContext = Record<string, unknown>;

/**
 * Custom error class for Caliper with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new CaliperError(
 *   ErrorCode.DIVISION_BY_ZERO_METRIC,
 *   "Baseline value for 'power' must be positive",
 *   { metric: 'power', baseline: 0 }
 * );
 * ```
 */
export class CaliperError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = 'CaliperError';

    Error.captureStackTrace(this, CaliperError);
  }

  /**
   * Create a formatted string representation of the error
   * Includes code, message, and context for debugging
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  /**
   * Check if this error matches a specific error code
   */
  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Check if this error is in a category of error codes
   */
  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is a CaliperError
 */
export function isCaliperError(error: unknown): error is CaliperError {
  return error instanceof CaliperError;
}

/**
 * Wrap an unknown thrown value as a CaliperError
 * CaliperErrors pass through untouched
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): CaliperError {
  if (isCaliperError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context: ErrorContext =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new CaliperError(code, message, context);
}

/**
 * Shorthand for the most common schema failure
 */
export function missingColumnError(
  columns: string[],
  context: ErrorContext = {}
): CaliperError {
  const list = columns.map((c) => `'${c}'`).join(', ');
  return new CaliperError(
    ErrorCode.MISSING_COLUMN,
    `Required column${columns.length === 1 ? '' : 's'} ${list} not found`,
    { ...context, columns }
  );
}
