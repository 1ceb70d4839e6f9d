/**
 * Transport types
 * @module s3v4-rest/transport/types
 */

/**
 * A signed request ready to go on the wire.
 */
export interface HttpRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: Uint8Array;
}

/**
 * Raw response. Header names are lower-case; repeated headers are joined
 * with ", ".
 */
export interface HttpResponse {
  readonly status: number;
  readonly headers: Record<string, string>;
  readonly body: Uint8Array;
}

/**
 * Sends requests. Status codes are returned, never thrown.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}
