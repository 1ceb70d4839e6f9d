/**
 * HTTP transport built on undici
 * @module s3v4-rest/transport/undici-transport
 */

import { request, type Dispatcher } from 'undici';
import { TransportError } from '../errors/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

export const DEFAULT_TIMEOUT_MS = 30000;

const METHODS: readonly Dispatcher.HttpMethod[] = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'OPTIONS',
  'PATCH',
];

export interface UndiciTransportOptions {
  /** Abort the request after this many milliseconds */
  readonly timeoutMs?: number;
  /** Custom dispatcher, e.g. a MockAgent or ProxyAgent */
  readonly dispatcher?: Dispatcher;
  /**
   * Origin to send requests to instead of the signed URL's own,
   * e.g. `http://localhost:8080`. The signed host header is kept.
   */
  readonly proxyEndpoint?: string;
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

/**
 * Transport sending requests with undici's `request`.
 */
export class UndiciTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly proxyEndpoint?: string;

  constructor(options: UndiciTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
    this.proxyEndpoint = options.proxyEndpoint;
  }

  /**
   * URL the request is actually sent to
   */
  resolveUrl(url: string): string {
    if (!this.proxyEndpoint) {
      return url;
    }
    const target = new URL(url);
    return new URL(target.pathname + target.search, this.proxyEndpoint).toString();
  }

  async send(httpRequest: HttpRequest): Promise<HttpResponse> {
    const url = this.resolveUrl(httpRequest.url);
    const wanted = httpRequest.method.toUpperCase();
    const method = METHODS.find((candidate) => candidate === wanted);
    if (method === undefined) {
      throw new TransportError({
        message: `Cannot send method ${httpRequest.method}`,
        code: 'UNSUPPORTED_METHOD',
        details: { method: httpRequest.method },
      });
    }
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await request(url, {
        method,
        headers: { ...httpRequest.headers },
        body: httpRequest.body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      const body = new Uint8Array(await response.body.arrayBuffer());

      return {
        status: response.statusCode,
        headers: flattenHeaders(response.headers),
        body,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw TransportError.timeout(url, this.timeoutMs);
      }
      throw TransportError.connectionFailed(url, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
