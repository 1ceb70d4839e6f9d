/**
 * Assembles request descriptors from user input and an endpoint
 * @module s3v4-rest/request/builder
 */

import type { Endpoint } from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';
import { Payload, getHeader, type RequestDescriptor } from '../signing/index.js';
import { systemClock, type Clock, type RequestInput } from './types.js';

/**
 * Object path: `/`, `/bucket` or `/bucket/key`
 */
export function buildObjectPath(bucket?: string, key?: string): string {
  if (key && !bucket) {
    throw ConfigurationError.invalidField('key', 'An object key requires a bucket');
  }
  if (!bucket) {
    return '/';
  }
  return key ? `/${bucket}/${key}` : `/${bucket}`;
}

/**
 * Build a descriptor ready for signing. Byte payloads get a content-length
 * header, which is sent but not signed.
 */
export function buildRequestDescriptor(
  input: RequestInput,
  endpoint: Endpoint,
  clock: Clock = systemClock
): RequestDescriptor {
  const payload = input.payload ?? Payload.empty();
  const headers: Record<string, string> = { ...input.headers };

  const length = payload.data?.byteLength;
  if (length && getHeader(headers, 'content-length') === undefined) {
    headers['content-length'] = String(length);
  }

  return {
    method: input.method,
    protocol: endpoint.protocol,
    host: endpoint.host,
    port: endpoint.port,
    path: buildObjectPath(input.bucket, input.key),
    query: input.parameters ?? [],
    headers,
    payload,
    timestamp: clock(),
  };
}
