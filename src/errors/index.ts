/**
 * Error system
 * @module s3v4-rest/errors
 */

export { S3RestError, isS3RestError, type S3RestErrorParams } from './error.js';

export {
  ConfigurationError,
  EncodingError,
  ClockError,
  TransportError,
  ResponseError,
} from './categories.js';
