/**
 * HTTP server that logs every request it receives, optionally forwarding
 * it to an upstream endpoint.
 */

import http from 'node:http';
import type { Logger } from '../observability/index.js';
import { UndiciTransport, type HttpResponse, type HttpTransport } from '../transport/index.js';

export interface LogServerOptions {
  readonly port: number;
  /** Interface to bind, all interfaces by default */
  readonly host?: string;
  /** Origin to forward requests to, e.g. `http://localhost:9000` */
  readonly upstream?: string;
  readonly logger: Logger;
  readonly transport?: HttpTransport;
}

export interface LogServerAddress {
  readonly host: string;
  readonly port: number;
}

// Never relayed in either direction; framing is recomputed per hop
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'transfer-encoding',
  'upgrade',
  'expect',
  'content-length',
]);

/**
 * Read the full request body
 */
async function readBody(req: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function endToEndHeaders(
  headers: Readonly<Record<string, string | string[] | undefined>>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined && !HOP_BY_HOP_HEADERS.has(name.toLowerCase())) {
      result[name] = Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return result;
}

/**
 * Logging HTTP server.
 */
export class LogServer {
  private readonly server: http.Server;
  private readonly options: LogServerOptions;
  private readonly transport?: HttpTransport;
  private count = 0;

  constructor(options: LogServerOptions) {
    this.options = options;
    this.transport = options.upstream ? options.transport ?? new UndiciTransport() : undefined;
    this.server = http.createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        this.options.logger.error('Failed to handle request', {
          error: error instanceof Error ? error.message : String(error),
        });
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'text/plain' });
        }
        res.end();
      });
    });
  }

  /**
   * Number of requests received so far
   */
  get requestCount(): number {
    return this.count;
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    const address = this.address();
    this.options.logger.info(`Log server listening on ${address?.host}:${address?.port}`, {
      upstream: this.options.upstream,
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Bound address, once started
   */
  address(): LogServerAddress | undefined {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      return undefined;
    }
    return { host: address.address, port: address.port };
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const number = ++this.count;
    const method = req.method ?? 'GET';
    const path = req.url ?? '/';
    const body = await readBody(req);

    this.options.logger.info(`Request #${number}: ${method} ${path} HTTP/${req.httpVersion}`, {
      headers: req.headers,
      ...(body.length > 0 ? { body: body.toString('utf8') } : {}),
    });

    if (!this.options.upstream || !this.transport) {
      res.writeHead(200, { 'Content-Type': 'text/html' });
      res.end();
      return;
    }

    const url = new URL(path, this.options.upstream).toString();
    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method,
        url,
        headers: endToEndHeaders(req.headers),
        body: body.length > 0 ? new Uint8Array(body) : undefined,
      });
    } catch (error) {
      this.options.logger.error(`Request #${number}: forwarding to ${url} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      res.writeHead(502, { 'Content-Type': 'text/plain' });
      res.end('Bad Gateway');
      return;
    }

    this.options.logger.info(`Request #${number}: upstream responded ${response.status}`, {
      headers: response.headers,
      ...(response.body.byteLength > 0 ? { body: Buffer.from(response.body).toString('utf8') } : {}),
    });

    res.writeHead(response.status, endToEndHeaders(response.headers));
    res.end(Buffer.from(response.body));
  }
}

/**
 * Create a logging server; call start() to listen
 */
export function createLogServer(options: LogServerOptions): LogServer {
  return new LogServer(options);
}
