/**
 * Signer - header-mode and query-mode S3 Signature V4 signing
 */

import { ClockError, ConfigurationError } from '../errors/index.js';
import {
  canonicalize,
  formatCanonicalRequest,
  getCanonicalHeaders,
  getHeader,
  getHostHeader,
  getPayloadHash,
} from './canonical.js';
import { hmacSha256, sha256Hex, toHex } from './crypto.js';
import { assertAmzDate, formatAmzDate, formatDateStamp } from './format.js';
import { createCredentialScope, deriveSigningKey } from './key-derivation.js';
import {
  HTTP_METHODS,
  Payload,
  type Credentials,
  type PresignOptions,
  type PresignedRequest,
  type QueryParameter,
  type RequestDescriptor,
  type SignedRequest,
  type SigningOptions,
} from './types.js';

export const ALGORITHM = 'AWS4-HMAC-SHA256';

/**
 * Maximum presigned URL lifetime (7 days)
 */
export const MAX_PRESIGN_EXPIRES = 604800;

/**
 * Query parameters owned by query-mode signing.
 */
export const PRESIGN_PARAMETERS = {
  ALGORITHM: 'X-Amz-Algorithm',
  CREDENTIAL: 'X-Amz-Credential',
  DATE: 'X-Amz-Date',
  EXPIRES: 'X-Amz-Expires',
  SIGNED_HEADERS: 'X-Amz-SignedHeaders',
  SECURITY_TOKEN: 'X-Amz-Security-Token',
  SIGNATURE: 'X-Amz-Signature',
} as const;

const RESERVED_QUERY_NAMES = new Set(
  Object.values(PRESIGN_PARAMETERS).map((name) => name.toLowerCase())
);

/**
 * Create string to sign. The timestamp's date must equal the scope's date.
 */
export function createStringToSign(
  amzDate: string,
  credentialScope: string,
  canonicalRequest: string
): string {
  assertAmzDate(amzDate);
  const scopeDate = credentialScope.split('/')[0] ?? '';
  if (amzDate.slice(0, 8) !== scopeDate) {
    throw ClockError.dateMismatch(amzDate, scopeDate);
  }
  return [ALGORITHM, amzDate, credentialScope, sha256Hex(canonicalRequest)].join('\n');
}

/**
 * Calculate the final signature: hex HMAC-SHA256 of the string to sign
 */
export function calculateSignature(signingKey: Uint8Array, stringToSign: string): string {
  return toHex(hmacSha256(signingKey, stringToSign));
}

/**
 * Sign a rendered canonical request
 */
export function sign(
  canonicalRequest: string,
  amzDate: string,
  credentialScope: string,
  signingKey: Uint8Array
): string {
  return calculateSignature(signingKey, createStringToSign(amzDate, credentialScope, canonicalRequest));
}

/**
 * Build the Authorization header value
 */
export function buildAuthorizationHeader(
  accessKeyId: string,
  credentialScope: string,
  signedHeaders: string,
  signature: string
): string {
  return [
    `${ALGORITHM} Credential=${accessKeyId}/${credentialScope}`,
    `SignedHeaders=${signedHeaders}`,
    `Signature=${signature}`,
  ].join(', ');
}

/**
 * Throws ConfigurationError when credentials are incomplete
 */
export function validateCredentials(credentials: Credentials): void {
  if (!credentials.accessKeyId) {
    throw ConfigurationError.missingField('accessKeyId');
  }
  if (!credentials.secretAccessKey) {
    throw ConfigurationError.missingField('secretAccessKey');
  }
  if (!credentials.region) {
    throw ConfigurationError.missingField('region');
  }
  if (!credentials.service) {
    throw ConfigurationError.missingField('service');
  }
}

/**
 * Throws ConfigurationError when required request fields are missing
 */
export function validateRequest(request: RequestDescriptor): void {
  if (!HTTP_METHODS.includes(request.method)) {
    throw ConfigurationError.invalidField('method', `Unsupported method: ${String(request.method)}`);
  }
  if (!request.host) {
    throw ConfigurationError.missingField('host');
  }
  if (request.port !== undefined && (!Number.isInteger(request.port) || request.port <= 0 || request.port > 65535)) {
    throw ConfigurationError.invalidField('port', `Invalid port: ${request.port}`);
  }
}

/**
 * Set a header, dropping any other spelling of the same name
 */
function setHeader(headers: Record<string, string>, name: string, value: string): void {
  for (const key of Object.keys(headers)) {
    if (key.trim().toLowerCase() === name) {
      delete headers[key];
    }
  }
  headers[name] = value;
}

/**
 * Reject an x-amz-date header that disagrees with the signing timestamp
 */
function checkDateHeader(headers: Readonly<Record<string, string>>, amzDate: string): void {
  const supplied = getHeader(headers, 'x-amz-date');
  if (supplied !== undefined && supplied.trim() !== amzDate) {
    throw new ClockError({
      message: `x-amz-date header ${supplied} does not match signing timestamp ${amzDate}`,
      code: 'TIMESTAMP_MISMATCH',
      details: { header: supplied, timestamp: amzDate },
    });
  }
}

function baseUrl(request: RequestDescriptor, canonicalUri: string): string {
  return `${request.protocol}://${getHostHeader(request)}${canonicalUri}`;
}

/**
 * Sign a request with an Authorization header
 */
export function signRequest(
  request: RequestDescriptor,
  credentials: Credentials,
  options: SigningOptions = {}
): SignedRequest {
  validateCredentials(credentials);
  validateRequest(request);

  const amzDate = formatAmzDate(request.timestamp);
  const dateStamp = formatDateStamp(request.timestamp);
  checkDateHeader(request.headers, amzDate);

  const headers: Record<string, string> = { ...request.headers };
  setHeader(headers, 'x-amz-date', amzDate);
  setHeader(headers, 'x-amz-content-sha256', getPayloadHash(request));
  if (getHeader(headers, 'host') === undefined) {
    headers['host'] = getHostHeader(request);
  }
  if (credentials.sessionToken) {
    setHeader(headers, 'x-amz-security-token', credentials.sessionToken);
  }

  const canonical = canonicalize({ ...request, headers }, options);
  const canonicalRequest = formatCanonicalRequest(canonical);

  const credentialScope = createCredentialScope(dateStamp, credentials.region, credentials.service);
  const stringToSign = createStringToSign(amzDate, credentialScope, canonicalRequest);
  const signingKey = deriveSigningKey(
    credentials.secretAccessKey,
    dateStamp,
    credentials.region,
    credentials.service
  );
  const signature = calculateSignature(signingKey, stringToSign);

  setHeader(
    headers,
    'authorization',
    buildAuthorizationHeader(credentials.accessKeyId, credentialScope, canonical.signedHeaders, signature)
  );

  const url = baseUrl(request, canonical.uri) + (canonical.query ? `?${canonical.query}` : '');

  return {
    method: request.method,
    url,
    headers,
    body: request.payload.data,
    canonicalRequest,
    stringToSign,
    credentialScope,
    signedHeaders: canonical.signedHeaders,
    signature,
  };
}

/**
 * Generate a presigned URL. The X-Amz-* parameters join the query set
 * before canonicalization; X-Amz-Signature is appended last.
 */
export function presignRequest(
  request: RequestDescriptor,
  credentials: Credentials,
  options: PresignOptions
): PresignedRequest {
  validateCredentials(credentials);
  validateRequest(request);

  const { expiresIn } = options;
  if (!Number.isInteger(expiresIn) || expiresIn <= 0 || expiresIn > MAX_PRESIGN_EXPIRES) {
    throw ConfigurationError.invalidField(
      'expiresIn',
      `Presigned URL expiration must be an integer between 1 and ${MAX_PRESIGN_EXPIRES} seconds`
    );
  }
  for (const [name] of request.query) {
    if (RESERVED_QUERY_NAMES.has(name.toLowerCase())) {
      throw ConfigurationError.invalidField('query', `Query parameter ${name} is set by the signer`);
    }
  }

  const amzDate = formatAmzDate(request.timestamp);
  const dateStamp = formatDateStamp(request.timestamp);
  checkDateHeader(request.headers, amzDate);

  const headers: Record<string, string> = { ...request.headers };
  if (getHeader(headers, 'host') === undefined) {
    headers['host'] = getHostHeader(request);
  }

  const credentialScope = createCredentialScope(dateStamp, credentials.region, credentials.service);
  const { signed: signedHeaders } = getCanonicalHeaders(headers, options.signedHeaders);

  const query: QueryParameter[] = [
    ...request.query,
    [PRESIGN_PARAMETERS.ALGORITHM, ALGORITHM],
    [PRESIGN_PARAMETERS.CREDENTIAL, `${credentials.accessKeyId}/${credentialScope}`],
    [PRESIGN_PARAMETERS.DATE, amzDate],
    [PRESIGN_PARAMETERS.EXPIRES, String(expiresIn)],
    [PRESIGN_PARAMETERS.SIGNED_HEADERS, signedHeaders],
  ];
  if (credentials.sessionToken) {
    query.push([PRESIGN_PARAMETERS.SECURITY_TOKEN, credentials.sessionToken]);
  }

  // Body content is never covered by a presigned URL
  const canonical = canonicalize(
    { ...request, headers, query, payload: Payload.unsigned() },
    options
  );
  const canonicalRequest = formatCanonicalRequest(canonical);
  const stringToSign = createStringToSign(amzDate, credentialScope, canonicalRequest);
  const signingKey = deriveSigningKey(
    credentials.secretAccessKey,
    dateStamp,
    credentials.region,
    credentials.service
  );
  const signature = calculateSignature(signingKey, stringToSign);

  return {
    method: request.method,
    url: `${baseUrl(request, canonical.uri)}?${canonical.query}&${PRESIGN_PARAMETERS.SIGNATURE}=${signature}`,
    expiresAt: new Date(request.timestamp.getTime() + expiresIn * 1000),
    canonicalRequest,
    credentialScope,
    signedHeaders: canonical.signedHeaders,
    signature,
  };
}

/**
 * Signer bound to one set of immutable credentials.
 */
export class Signer {
  private readonly credentials: Credentials;

  constructor(credentials: Credentials) {
    validateCredentials(credentials);
    this.credentials = Object.freeze({ ...credentials });
  }

  /**
   * Sign with an Authorization header
   */
  sign(request: RequestDescriptor, options?: SigningOptions): SignedRequest {
    return signRequest(request, this.credentials, options);
  }

  /**
   * Sign into the query string
   */
  presign(request: RequestDescriptor, options: PresignOptions): PresignedRequest {
    return presignRequest(request, this.credentials, options);
  }

  get accessKeyId(): string {
    return this.credentials.accessKeyId;
  }

  get region(): string {
    return this.credentials.region;
  }

  get service(): string {
    return this.credentials.service;
  }
}
