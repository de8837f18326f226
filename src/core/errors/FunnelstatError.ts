/**
 * Core error handling system for Funnelstat
 *
 * Provides consistent error handling across the analysis pipeline with:
 * - Structured error codes for different error categories
 * - Context preservation for debugging
 * - Proper stack trace handling
 *
 * Undefined mathematical results (zero baselines, empty funnel stages, zero revenue)
 * are not errors: they surface as `null` values or flags on the result objects.
 */

export enum ErrorCode {
  // Input data errors
  VALIDATION = 'VALIDATION',
  INVALID_INPUT = 'INVALID_INPUT',

  // Reported only through flags and null values, never thrown by the analyzers
  DEGENERATE_RESULT = 'DEGENERATE_RESULT',

  INVALID_CONFIG = 'INVALID_CONFIG',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type ErrorContext = Record<string, unknown>;

/**
 * Error with a structured code and optional context
 *
 * @example
 * ```typescript
 * throw new FunnelstatError(
 *   ErrorCode.INVALID_CONFIG,
 *   'alpha must be between 0 and 1',
 *   { alpha: 1.5 }
 * );
 * ```
 */
export class FunnelstatError extends Error {
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
    this.name = 'FunnelstatError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Code, message and context on one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Malformed or inconsistent input: missing variant, non-monotonic funnel,
 * unknown stage identifier, missing table column
 */
export class ValidationError extends FunnelstatError {
  constructor(message: string, context?: ErrorContext) {
    super(ErrorCode.VALIDATION, message, context);
    this.name = 'ValidationError';
  }
}

/**
 * Out-of-domain numeric argument, e.g. a zero sample size
 */
export class InvalidInputError extends FunnelstatError {
  constructor(message: string, context?: ErrorContext) {
    super(ErrorCode.INVALID_INPUT, message, context);
    this.name = 'InvalidInputError';
  }
}

export function isFunnelstatError(error: unknown): error is FunnelstatError {
  return error instanceof FunnelstatError;
}

/**
 * Wrap an unknown thrown value as a FunnelstatError
 * Useful for catch blocks where the error type is unknown
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): FunnelstatError {
  if (isFunnelstatError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context: ErrorContext =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new FunnelstatError(code, message, context);
}
