/**
 * S3 Signature V4 signing core
 * @module s3v4-rest/signing
 */

export * from './types.js';
export {
  UNSIGNED_PAYLOAD,
  EMPTY_SHA256,
  DEFAULT_SIGNED_HEADERS,
  uriEncode,
  getCanonicalUri,
  getCanonicalQueryString,
  getCanonicalHeaders,
  getHeader,
  getHostHeader,
  getPayloadHash,
  shouldSignHeader,
  canonicalize,
  formatCanonicalRequest,
} from './canonical.js';
export { hmacSha256, sha256Hash, sha256Hex, toHex } from './crypto.js';
export { formatAmzDate, formatDateStamp, parseAmzDate } from './format.js';
export { SCOPE_TERMINATOR, deriveSigningKey, createCredentialScope } from './key-derivation.js';
export {
  ALGORITHM,
  MAX_PRESIGN_EXPIRES,
  PRESIGN_PARAMETERS,
  createStringToSign,
  calculateSignature,
  sign,
  buildAuthorizationHeader,
  validateCredentials,
  signRequest,
  presignRequest,
  Signer,
} from './signer.js';
