/**
 * Base error class for the S3 REST signing toolkit
 * @module s3v4-rest/errors/error
 */

/**
 * Parameters for creating an S3RestError
 */
export interface S3RestErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Machine-readable error code
   */
  readonly code: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, when this one wraps another
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all toolkit failures.
 *
 * Signing never retries: every error raised by the signing core is fatal
 * for the request that produced it.
 */
export class S3RestError extends Error {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Machine-readable error code
   */
  readonly code: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error
   */
  override readonly cause?: unknown;

  constructor(params: S3RestErrorParams) {
    super(params.message);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, S3RestError.prototype);

    this.name = 'S3RestError';
    this.type = params.type;
    this.code = params.code;
    this.details = params.details;
    this.cause = params.cause;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, S3RestError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }

  /**
   * Returns a string representation of the error
   */
  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Type guard for toolkit errors
 */
export function isS3RestError(error: unknown): error is S3RestError {
  return error instanceof S3RestError;
}
