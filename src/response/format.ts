/**
 * Human-readable response rendering
 * @module s3v4-rest/response/format
 */

import type { HttpResponse } from '../transport/index.js';
import { isS3RestError } from '../errors/index.js';
import { prettyPrintXml } from './xml.js';

export const DEFAULT_MAX_BINARY_BYTES = 1024;

export interface FormatOptions {
  /** Bytes shown for content that is neither text, JSON nor XML */
  readonly maxBinaryBytes?: number;
}

const decoder = new TextDecoder('utf-8');

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Case-insensitive header lookup
 */
export function findHeader(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
}

/**
 * `name: value` lines for each requested header present in the response,
 * e.g. `pickHeaders(headers, 'ETag,x-amz-request-id')`
 */
export function pickHeaders(headers: Readonly<Record<string, string>>, names: string): string[] {
  const lines: string[] = [];
  for (const name of names.split(',').map((n) => n.trim())) {
    if (!name) {
      continue;
    }
    const value = findHeader(headers, name);
    if (value !== undefined) {
      lines.push(`${name}: ${value}`);
    }
  }
  return lines;
}

/**
 * Render the body according to its content type
 */
export function formatContent(response: HttpResponse, options: FormatOptions = {}): string {
  const contentType = (findHeader(response.headers, 'content-type') ?? '').toLowerCase();
  const text = (): string => decoder.decode(response.body);

  if (contentType.includes('xml') || contentType.includes('text/html')) {
    try {
      return prettyPrintXml(text());
    } catch (error) {
      // HTML is often not well-formed XML
      if (isS3RestError(error)) {
        return text();
      }
      throw error;
    }
  }
  if (contentType.includes('json')) {
    try {
      return JSON.stringify(JSON.parse(text()), null, 2);
    } catch (error) {
      if (error instanceof SyntaxError) {
        return text();
      }
      throw error;
    }
  }
  if (contentType.startsWith('text/')) {
    return text();
  }
  const limit = options.maxBinaryBytes ?? DEFAULT_MAX_BINARY_BYTES;
  return decoder.decode(response.body.subarray(0, limit));
}

/**
 * Status, headers and content as a printable block
 */
export function formatResponse(response: HttpResponse, options: FormatOptions = {}): string {
  const lines = [`STATUS CODE: ${response.status}`, '', 'HEADERS:'];
  for (const [name, value] of Object.entries(response.headers)) {
    lines.push(`${name}: ${value}`);
  }
  if (response.body.byteLength > 0) {
    lines.push('', 'RESPONSE CONTENT', '='.repeat(20), formatContent(response, options));
  }
  return lines.join('\n');
}
