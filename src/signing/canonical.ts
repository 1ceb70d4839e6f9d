/**
 * Canonical request construction for S3 Signature V4
 */

import { ConfigurationError, EncodingError } from '../errors/index.js';
import { sha256Hex } from './crypto.js';
import type {
  CanonicalRequest,
  QueryParameter,
  RequestDescriptor,
  SigningOptions,
} from './types.js';

export const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD';
export const EMPTY_SHA256 =
  'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

/**
 * Headers signed by default besides host and x-amz-*.
 */
export const DEFAULT_SIGNED_HEADERS: readonly string[] = [
  'content-md5',
  'content-type',
  'range',
];

const encoder = new TextEncoder();

const HEADER_VALUE_FORBIDDEN = /[\x00-\x08\x0a-\x1f\x7f]/;
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Throws EncodingError if the string holds a lone UTF-16 surrogate
 */
export function assertWellFormed(str: string, context: string): void {
  for (let i = 0; i < str.length; i++) {
    const code = str.charCodeAt(i);
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = str.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
        continue;
      }
      throw EncodingError.invalidUnicode(context);
    }
    if (code >= 0xdc00 && code <= 0xdfff) {
      throw EncodingError.invalidUnicode(context);
    }
  }
}

/**
 * URI encode following S3 requirements (RFC 3986)
 * Different from standard encodeURIComponent
 */
export function uriEncode(str: string, encodeSlash = true): string {
  assertWellFormed(str, 'URI component');

  let encoded = '';
  for (const char of str) {
    const code = char.charCodeAt(0);

    // Unreserved characters: A-Z a-z 0-9 - _ . ~
    if (
      (code >= 0x41 && code <= 0x5a) || // A-Z
      (code >= 0x61 && code <= 0x7a) || // a-z
      (code >= 0x30 && code <= 0x39) || // 0-9
      code === 0x2d || // -
      code === 0x5f || // _
      code === 0x2e || // .
      code === 0x7e // ~
    ) {
      encoded += char;
    } else if (char === '/' && !encodeSlash) {
      encoded += '/';
    } else {
      for (const byte of encoder.encode(char)) {
        encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
      }
    }
  }
  return encoded;
}

/**
 * Get canonical URI from a raw path. Each segment is encoded on its own;
 * empty segments are kept since S3 keys may contain "//".
 */
export function getCanonicalUri(path: string): string {
  if (!path) {
    return '/';
  }
  const normalized = path.startsWith('/') ? path : '/' + path;
  return normalized
    .split('/')
    .map((segment) => uriEncode(segment, true))
    .join('/');
}

/**
 * Get canonical query string
 * Names and values are encoded independently, then sorted by name and value
 */
export function getCanonicalQueryString(params: readonly QueryParameter[]): string {
  const encoded: Array<[string, string]> = params.map(([name, value]) => {
    if (name === '') {
      throw EncodingError.emptyParameterName();
    }
    return [uriEncode(name), uriEncode(value)];
  });

  encoded.sort((a, b) => {
    if (a[0] < b[0]) return -1;
    if (a[0] > b[0]) return 1;
    if (a[1] < b[1]) return -1;
    if (a[1] > b[1]) return 1;
    return 0;
  });

  return encoded.map(([name, value]) => `${name}=${value}`).join('&');
}

/**
 * Whether a lower-case header name is covered by the signature
 */
export function shouldSignHeader(
  name: string,
  signedHeaders: readonly string[] = DEFAULT_SIGNED_HEADERS
): boolean {
  const lower = name.toLowerCase();
  return lower === 'host' || lower.startsWith('x-amz-') || signedHeaders.includes(lower);
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(
  headers: Readonly<Record<string, string>>,
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.trim().toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Get canonical headers and the signed header list.
 * Only headers passing the signing policy are included; repeated names are
 * joined with a comma.
 */
export function getCanonicalHeaders(
  headers: Readonly<Record<string, string>>,
  signedHeaders?: readonly string[]
): { canonical: string; signed: string } {
  const selected = new Map<string, string[]>();

  for (const [rawName, rawValue] of Object.entries(headers)) {
    const name = rawName.trim().toLowerCase();
    if (!HEADER_NAME_PATTERN.test(name)) {
      throw EncodingError.invalidHeader(rawName);
    }
    if (!shouldSignHeader(name, signedHeaders)) {
      continue;
    }
    if (HEADER_VALUE_FORBIDDEN.test(rawValue)) {
      throw EncodingError.invalidHeader(rawName);
    }
    assertWellFormed(rawValue, `Header ${rawName}`);

    // Trim and collapse inner whitespace
    const value = rawValue.trim().replace(/\s+/g, ' ');
    const values = selected.get(name) ?? [];
    values.push(value);
    selected.set(name, values);
  }

  if (!selected.has('host')) {
    throw ConfigurationError.missingField('host', 'Missing required header: host');
  }

  const names = Array.from(selected.keys()).sort();
  const canonical = names
    .map((name) => `${name}:${(selected.get(name) ?? []).join(',')}\n`)
    .join('');

  return { canonical, signed: names.join(';') };
}

/**
 * Hash the payload, honouring a caller-supplied x-amz-content-sha256
 */
export function getPayloadHash(request: Pick<RequestDescriptor, 'headers' | 'payload'>): string {
  const supplied = getHeader(request.headers, 'x-amz-content-sha256');
  if (supplied !== undefined) {
    return supplied.trim();
  }
  if (request.payload.type === 'unsigned') {
    return UNSIGNED_PAYLOAD;
  }
  return sha256Hex(request.payload.data);
}

/**
 * Host header value: host plus any non-default port
 */
export function getHostHeader(request: Pick<RequestDescriptor, 'protocol' | 'host' | 'port'>): string {
  const defaultPort = request.protocol === 'https' ? 443 : 80;
  if (request.port === undefined || request.port === defaultPort) {
    return request.host;
  }
  return `${request.host}:${request.port}`;
}

/**
 * Canonicalize a request descriptor. A host header is derived from the
 * descriptor when the caller did not set one.
 */
export function canonicalize(
  request: RequestDescriptor,
  options: SigningOptions = {}
): CanonicalRequest {
  const headers: Record<string, string> = { ...request.headers };
  if (getHeader(headers, 'host') === undefined) {
    headers['host'] = getHostHeader(request);
  }

  const { canonical, signed } = getCanonicalHeaders(headers, options.signedHeaders);

  return {
    method: request.method.toUpperCase(),
    uri: getCanonicalUri(request.path),
    query: getCanonicalQueryString(request.query),
    headers: canonical,
    signedHeaders: signed,
    payloadHash: getPayloadHash(request),
  };
}

/**
 * Render a canonical request
 * Format:
 * HTTP_METHOD\n
 * CANONICAL_URI\n
 * CANONICAL_QUERY_STRING\n
 * CANONICAL_HEADERS\n
 * SIGNED_HEADERS\n
 * PAYLOAD_HASH
 */
export function formatCanonicalRequest(canonical: CanonicalRequest): string {
  return [
    canonical.method,
    canonical.uri,
    canonical.query,
    canonical.headers,
    canonical.signedHeaders,
    canonical.payloadHash,
  ].join('\n');
}
