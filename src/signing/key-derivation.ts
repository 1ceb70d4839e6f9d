/**
 * Signing key derivation for S3 Signature V4
 */

import { ConfigurationError } from '../errors/index.js';
import { hmacSha256 } from './crypto.js';
import { assertDateStamp } from './format.js';

export const SCOPE_TERMINATOR = 'aws4_request';

/**
 * Derive signing key using HMAC-SHA256 chaining
 * kSecret = "AWS4" + secretAccessKey
 * kDate = HMAC-SHA256(kSecret, dateStamp)
 * kRegion = HMAC-SHA256(kDate, region)
 * kService = HMAC-SHA256(kRegion, service)
 * kSigning = HMAC-SHA256(kService, "aws4_request")
 *
 * Every step keys the next with raw bytes, never hex.
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string
): Uint8Array {
  if (!secretAccessKey) {
    throw ConfigurationError.missingField('secretAccessKey');
  }
  if (!region) {
    throw ConfigurationError.missingField('region');
  }
  if (!service) {
    throw ConfigurationError.missingField('service');
  }
  assertDateStamp(dateStamp);

  const kDate = hmacSha256('AWS4' + secretAccessKey, dateStamp);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, SCOPE_TERMINATOR);
}

/**
 * Credential scope: date/region/service/aws4_request
 */
export function createCredentialScope(dateStamp: string, region: string, service: string): string {
  return `${dateStamp}/${region}/${service}/${SCOPE_TERMINATOR}`;
}
