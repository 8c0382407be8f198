/**
 * Base error class for all sink errors.
 *
 * Provides structured error information with a category and optional cause
 * tracking.
 */

/**
 * Error category for classifying sink errors
 */
export type ErrorCategory = 'configuration' | 'context' | 'export';

/**
 * Base error class for all sink errors.
 */
export abstract class OtelSinkError extends Error {
  /**
   * The category of error for classification and handling
   */
  public readonly category: ErrorCategory;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  /**
   * The original error that caused this error, if any
   */
  public readonly cause?: Error;

  constructor(options: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message);
    this.name = 'OtelSinkError';
    this.category = options.category;
    this.details = options.details;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  /**
   * Returns a human-readable string representation of the error
   */
  toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.cause) {
      result += `\nCaused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Type guard to check if an error is an OtelSinkError
 */
export function isOtelSinkError(error: unknown): error is OtelSinkError {
  return error instanceof OtelSinkError;
}

/**
 * Type guard to check if an error belongs to a specific category
 */
export function isErrorCategory(error: unknown, category: ErrorCategory): boolean {
  return isOtelSinkError(error) && error.category === category;
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
