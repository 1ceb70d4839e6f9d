/**
 * Tests for the undici transport
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type IncomingMessage, type Server } from 'node:http';
import { MockAgent } from 'undici';
import { UndiciTransport } from '../undici-transport.js';
import { TransportError } from '../../errors/index.js';

describe('UndiciTransport with MockAgent', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should return status, lower-case headers and body', async () => {
    agent
      .get('http://localhost:9000')
      .intercept({ path: '/photos?list-type=2', method: 'GET' })
      .reply(200, '<ListBucketResult/>', { headers: { 'Content-Type': 'application/xml' } });

    const transport = new UndiciTransport({ dispatcher: agent });
    const response = await transport.send({
      method: 'GET',
      url: 'http://localhost:9000/photos?list-type=2',
      headers: { host: 'localhost:9000' },
    });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('application/xml');
    expect(new TextDecoder().decode(response.body)).toBe('<ListBucketResult/>');
  });

  it('should return error statuses without throwing', async () => {
    agent
      .get('http://localhost:9000')
      .intercept({ path: '/missing', method: 'HEAD' })
      .reply(404, '');

    const transport = new UndiciTransport({ dispatcher: agent });
    const response = await transport.send({ method: 'HEAD', url: 'http://localhost:9000/missing', headers: {} });

    expect(response.status).toBe(404);
    expect(response.body).toHaveLength(0);
  });

  it('should map network failures to TransportError', async () => {
    agent
      .get('http://localhost:9000')
      .intercept({ path: '/photos', method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    const transport = new UndiciTransport({ dispatcher: agent });
    const sent = transport.send({ method: 'GET', url: 'http://localhost:9000/photos', headers: {} });

    await expect(sent).rejects.toBeInstanceOf(TransportError);
    await expect(sent).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'Request to http://localhost:9000/photos failed: socket hang up',
    });
  });

  it('should reject methods it cannot send', async () => {
    const transport = new UndiciTransport({ dispatcher: agent });
    await expect(
      transport.send({ method: 'BREW', url: 'http://localhost:9000/', headers: {} })
    ).rejects.toMatchObject({ code: 'UNSUPPORTED_METHOD' });
  });
});

describe('UndiciTransport against a local server', () => {
  let server: Server;
  let origin: string;
  let received: Array<{ method?: string; url?: string; host?: string; body: string }>;
  let hold: boolean;

  beforeEach(async () => {
    received = [];
    hold = false;
    server = createServer((req: IncomingMessage, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        received.push({
          method: req.method,
          url: req.url,
          host: req.headers.host,
          body: Buffer.concat(chunks).toString('utf8'),
        });
        if (!hold) {
          res.writeHead(200, { 'content-type': 'text/plain' });
          res.end('ok');
        }
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    origin = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('should send the body', async () => {
    const transport = new UndiciTransport();
    const response = await transport.send({
      method: 'PUT',
      url: `${origin}/photos/a.txt`,
      headers: { 'content-type': 'text/plain' },
      body: new TextEncoder().encode('hello'),
    });

    expect(response.status).toBe(200);
    expect(received).toEqual([{ method: 'PUT', url: '/photos/a.txt', host: origin.slice(7), body: 'hello' }]);
  });

  it('should send to the proxy endpoint while keeping the signed host', async () => {
    const transport = new UndiciTransport({ proxyEndpoint: origin });
    await transport.send({
      method: 'GET',
      url: 'https://storage.example.com/photos?versions=',
      headers: { host: 'storage.example.com' },
    });

    expect(received).toEqual([{ method: 'GET', url: '/photos?versions=', host: 'storage.example.com', body: '' }]);
  });

  it('should time out', async () => {
    hold = true;
    const transport = new UndiciTransport({ timeoutMs: 50 });

    await expect(transport.send({ method: 'GET', url: `${origin}/slow`, headers: {} })).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: `Request to ${origin}/slow timed out after 50ms`,
    });
  });
});
