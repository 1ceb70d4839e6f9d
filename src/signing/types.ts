/**
 * Signing types for S3 Signature V4 authentication
 */

/**
 * HTTP methods the toolkit can sign and send.
 */
export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'HEAD' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'PUT', 'POST', 'HEAD', 'DELETE'];

/**
 * Credentials and scope used to sign requests.
 */
export interface Credentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  /** Region in the credential scope, e.g. "us-east-1" */
  readonly region: string;
  /** Service in the credential scope, "s3" for object storage */
  readonly service: string;
  /** Temporary-credential session token, sent as x-amz-security-token */
  readonly sessionToken?: string;
}

/**
 * Request body as seen by the signer.
 *
 * `bytes` is hashed into the signature. `unsigned` signs the literal
 * UNSIGNED-PAYLOAD instead, leaving body content unprotected.
 */
export type SignablePayload =
  | { readonly type: 'bytes'; readonly data: Uint8Array }
  | { readonly type: 'unsigned'; readonly data?: Uint8Array };

/**
 * SignablePayload factory functions.
 */
export const Payload = {
  bytes(data: Uint8Array): SignablePayload {
    return { type: 'bytes', data };
  },
  text(text: string): SignablePayload {
    return { type: 'bytes', data: new TextEncoder().encode(text) };
  },
  empty(): SignablePayload {
    return { type: 'bytes', data: new Uint8Array(0) };
  },
  /** Body sent as-is but left out of the signature; omit data for streaming */
  unsigned(data?: Uint8Array): SignablePayload {
    return data === undefined ? { type: 'unsigned' } : { type: 'unsigned', data };
  },
};

/**
 * Query parameter as a [name, value] pair. An empty value is a flag-style
 * parameter, rendered `name=`.
 */
export type QueryParameter = readonly [name: string, value: string];

/**
 * Everything needed to sign one request. Built fresh per request and never
 * mutated once signing begins.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly protocol: 'http' | 'https';
  readonly host: string;
  readonly port?: number;
  /** Raw (unencoded) path, e.g. "/bucket/key name.txt" */
  readonly path: string;
  readonly query: readonly QueryParameter[];
  /** Header names are case-insensitive */
  readonly headers: Readonly<Record<string, string>>;
  readonly payload: SignablePayload;
  /** UTC signing instant */
  readonly timestamp: Date;
}

/**
 * Canonical request components.
 */
export interface CanonicalRequest {
  readonly method: string;
  readonly uri: string;
  readonly query: string;
  /** Canonical header block, every line terminated by \n */
  readonly headers: string;
  readonly signedHeaders: string;
  readonly payloadHash: string;
}

/**
 * Options shared by header and query signing.
 */
export interface SigningOptions {
  /**
   * Lower-case names of the headers to sign. Defaults to host, content-md5,
   * content-type, range and every x-amz-* header present.
   */
  readonly signedHeaders?: readonly string[];
}

/**
 * Result of header-mode signing.
 */
export interface SignedRequest {
  readonly method: HttpMethod;
  /** Final URL, query string in canonical form */
  readonly url: string;
  /** Headers to transmit, including authorization */
  readonly headers: Record<string, string>;
  readonly body?: Uint8Array;
  readonly canonicalRequest: string;
  readonly stringToSign: string;
  readonly credentialScope: string;
  readonly signedHeaders: string;
  readonly signature: string;
}

/**
 * Options for query-mode signing.
 */
export interface PresignOptions extends SigningOptions {
  /** Validity in seconds, 1..604800 */
  readonly expiresIn: number;
}

/**
 * Result of query-mode signing.
 */
export interface PresignedRequest {
  readonly method: HttpMethod;
  /** URL carrying every X-Amz-* parameter, X-Amz-Signature last */
  readonly url: string;
  readonly expiresAt: Date;
  readonly canonicalRequest: string;
  readonly credentialScope: string;
  readonly signedHeaders: string;
  readonly signature: string;
}
