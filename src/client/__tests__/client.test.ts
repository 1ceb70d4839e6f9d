/**
 * Tests for S3RestClient with an in-memory transport
 */

import { describe, it, expect } from 'vitest';
import { S3RestClient } from '../client.js';
import type { Logger, LogContext } from '../../observability/index.js';
import { Payload, signRequest } from '../../signing/index.js';
import { TransportError } from '../../errors/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../../transport/index.js';

class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly reply: HttpResponse | Error) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

interface LogEntry {
  level: string;
  message: string;
  context?: LogContext;
}

class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  error(message: string, context?: LogContext): void {
    this.entries.push({ level: 'error', message, context });
  }
  warn(message: string, context?: LogContext): void {
    this.entries.push({ level: 'warn', message, context });
  }
  info(message: string, context?: LogContext): void {
    this.entries.push({ level: 'info', message, context });
  }
  debug(message: string, context?: LogContext): void {
    this.entries.push({ level: 'debug', message, context });
  }
  trace(message: string, context?: LogContext): void {
    this.entries.push({ level: 'trace', message, context });
  }
}

const config = {
  access_key: 'test-access-key',
  secret_key: 'test-secret',
  protocol: 'https',
  host: 's3.example.com',
} as const;

const clock = (): Date => new Date('2013-05-24T00:00:00Z');

const ok: HttpResponse = { status: 200, headers: { etag: '"abc"' }, body: new Uint8Array(0) };

describe('S3RestClient', () => {
  it('should sign and send a GET', async () => {
    const transport = new FakeTransport(ok);
    const client = new S3RestClient({ config, transport, clock });

    const response = await client.send({ method: 'GET', bucket: 'photos', key: 'a.txt' });

    expect(response).toBe(ok);
    expect(transport.requests).toHaveLength(1);

    const expected = signRequest(
      {
        method: 'GET',
        protocol: 'https',
        host: 's3.example.com',
        path: '/photos/a.txt',
        query: [],
        headers: {},
        payload: Payload.empty(),
        timestamp: clock(),
      },
      { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret', region: 'us-east-1', service: 's3' }
    );
    const [sent] = transport.requests;
    expect(sent?.url).toBe('https://s3.example.com/photos/a.txt');
    expect(sent?.headers['authorization']).toBe(expected.headers['authorization']);
    expect(sent?.body).toBeUndefined();
  });

  it('should send the body with its length', async () => {
    const transport = new FakeTransport(ok);
    const client = new S3RestClient({ config, transport, clock, region: 'eu-west-1' });

    await client.send({
      method: 'PUT',
      bucket: 'photos',
      key: 'a.txt',
      parameters: [['tagging', '']],
      payload: Payload.text('hello'),
    });

    const [sent] = transport.requests;
    expect(sent?.url).toBe('https://s3.example.com/photos/a.txt?tagging=');
    expect(sent?.headers['content-length']).toBe('5');
    expect(sent?.headers['authorization']).toMatch(
      /^AWS4-HMAC-SHA256 Credential=test-access-key\/20130524\/eu-west-1\/s3\/aws4_request, SignedHeaders=host;x-amz-content-sha256;x-amz-date, Signature=[0-9a-f]{64}$/
    );
    expect(new TextDecoder().decode(sent?.body)).toBe('hello');
  });

  it('should log without the secret', async () => {
    const logger = new RecordingLogger();
    const client = new S3RestClient({ config, transport: new FakeTransport(ok), clock, logger });

    await client.send({ method: 'GET' });

    expect(logger.entries.map((e) => `${e.level} ${e.message}`)).toEqual([
      'debug Request signed',
      'info GET https://s3.example.com/',
      'info Response received',
    ]);
    expect(JSON.stringify(logger.entries)).not.toContain('test-secret');
  });

  it('should log error statuses at error level', async () => {
    const logger = new RecordingLogger();
    const transport = new FakeTransport({ status: 403, headers: {}, body: new Uint8Array(0) });
    const client = new S3RestClient({ config, transport, clock, logger });

    const response = await client.send({ method: 'GET', bucket: 'private' });

    expect(response.status).toBe(403);
    expect(logger.entries.at(-1)?.level).toBe('error');
    expect(logger.entries.at(-1)?.message).toBe('Request failed with status 403');
  });

  it('should log and rethrow transport errors', async () => {
    const logger = new RecordingLogger();
    const failure = TransportError.timeout('https://s3.example.com/', 10);
    const client = new S3RestClient({ config, transport: new FakeTransport(failure), clock, logger });

    await expect(client.send({ method: 'GET' })).rejects.toBe(failure);
    expect(logger.entries.at(-1)).toMatchObject({ level: 'error', message: 'GET https://s3.example.com/ failed' });
  });

  it('should presign without sending', () => {
    const transport = new FakeTransport(ok);
    const client = new S3RestClient({ config, transport, clock });

    const presigned = client.presign({ method: 'GET', bucket: 'photos', key: 'a.txt' }, 3600);

    expect(transport.requests).toHaveLength(0);
    expect(presigned.url).toMatch(
      /^https:\/\/s3\.example\.com\/photos\/a\.txt\?X-Amz-Algorithm=AWS4-HMAC-SHA256&X-Amz-Credential=test-access-key%2F20130524%2Fus-east-1%2Fs3%2Faws4_request&X-Amz-Date=20130524T000000Z&X-Amz-Expires=3600&X-Amz-SignedHeaders=host&X-Amz-Signature=[0-9a-f]{64}$/
    );
  });
});
