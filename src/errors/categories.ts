/**
 * Error categories
 * @module s3v4-rest/errors/categories
 */

import { S3RestError, type S3RestErrorParams } from './error.js';

type CategoryParams = Omit<S3RestErrorParams, 'type'>;

/**
 * Missing or malformed credentials, configuration or required request fields.
 * Raised before any hashing takes place.
 */
export class ConfigurationError extends S3RestError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'config_error' });
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  /**
   * A required field is absent or empty
   */
  static missingField(field: string, message?: string): ConfigurationError {
    return new ConfigurationError({
      message: message ?? `${field} is required`,
      code: 'MISSING_FIELD',
      details: { field },
    });
  }

  /**
   * A field is present but its value is unusable
   */
  static invalidField(field: string, message: string): ConfigurationError {
    return new ConfigurationError({
      message,
      code: 'INVALID_FIELD',
      details: { field },
    });
  }
}

/**
 * A name or value cannot be represented under the SigV4 encoding rules.
 */
export class EncodingError extends S3RestError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'encoding_error' });
    this.name = 'EncodingError';
    Object.setPrototypeOf(this, EncodingError.prototype);
  }

  /**
   * String holds a lone UTF-16 surrogate and has no UTF-8 form
   */
  static invalidUnicode(context: string): EncodingError {
    return new EncodingError({
      message: `${context} contains characters that cannot be UTF-8 encoded`,
      code: 'INVALID_UNICODE',
      details: { context },
    });
  }

  /**
   * Query parameter without a name
   */
  static emptyParameterName(): EncodingError {
    return new EncodingError({
      message: 'Query parameter name must not be empty',
      code: 'EMPTY_PARAMETER_NAME',
    });
  }

  /**
   * Header name or value with characters a canonical header line cannot hold
   */
  static invalidHeader(name: string): EncodingError {
    return new EncodingError({
      message: `Header ${name} contains control characters`,
      code: 'INVALID_HEADER',
      details: { header: name },
    });
  }
}

/**
 * Timestamp and date component disagree. Indicates a derivation bug in the
 * caller; never corrected silently.
 */
export class ClockError extends S3RestError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'clock_error' });
    this.name = 'ClockError';
    Object.setPrototypeOf(this, ClockError.prototype);
  }

  static dateMismatch(amzDate: string, scopeDate: string): ClockError {
    return new ClockError({
      message: `Timestamp ${amzDate} does not match credential scope date ${scopeDate}`,
      code: 'DATE_MISMATCH',
      details: { amzDate, scopeDate },
    });
  }

  static invalidFormat(value: string, expected: string): ClockError {
    return new ClockError({
      message: `Invalid timestamp ${JSON.stringify(value)}, expected ${expected}`,
      code: 'INVALID_TIMESTAMP',
      details: { value, expected },
    });
  }
}

/**
 * Network-level failure while sending a signed request.
 */
export class TransportError extends S3RestError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'transport_error' });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  static connectionFailed(url: string, cause: unknown): TransportError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new TransportError({
      message: `Request to ${url} failed: ${reason}`,
      code: 'CONNECTION_FAILED',
      details: { url },
      cause,
    });
  }

  static timeout(url: string, timeoutMs: number): TransportError {
    return new TransportError({
      message: `Request to ${url} timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { url, timeoutMs },
    });
  }
}

/**
 * Response content could not be interpreted.
 */
export class ResponseError extends S3RestError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'response_error' });
    this.name = 'ResponseError';
    Object.setPrototypeOf(this, ResponseError.prototype);
  }

  static invalidXml(cause: unknown): ResponseError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ResponseError({
      message: `Failed to parse XML: ${reason}`,
      code: 'XML_PARSE_ERROR',
      cause,
    });
  }
}
