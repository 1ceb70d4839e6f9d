/**
 * Parsing of command-line style request fragments
 * @module s3v4-rest/request/parse
 */

import { ConfigurationError, EncodingError } from '../errors/index.js';
import { HTTP_METHODS, type HttpMethod, type QueryParameter } from '../signing/index.js';

/**
 * Parse an HTTP method name, case-insensitive
 */
export function parseHttpMethod(text: string): HttpMethod {
  const wanted = text.trim().toUpperCase();
  const method = HTTP_METHODS.find((candidate) => candidate === wanted);
  if (method === undefined) {
    throw ConfigurationError.invalidField(
      'method',
      `Unsupported method: ${text}. Expected one of ${HTTP_METHODS.join(', ')}`
    );
  }
  return method;
}

/**
 * Split `;`-separated items, dropping empty ones
 */
function splitList(text: string): string[] {
  return text.split(';').filter((item) => item.length > 0);
}

/**
 * Parse `a=1;flag=;b=x=y` into ordered query parameters.
 * Only the first `=` separates name from value; an item without `=` is a
 * flag with an empty value.
 */
export function parseParameterList(text: string): QueryParameter[] {
  return splitList(text).map((item): QueryParameter => {
    const separator = item.indexOf('=');
    const name = separator < 0 ? item : item.slice(0, separator);
    if (!name) {
      throw EncodingError.emptyParameterName();
    }
    return [name, separator < 0 ? '' : item.slice(separator + 1)];
  });
}

/**
 * Parse `Header-1:value1;Header-2:value2` into a header map
 */
export function parseHeaderList(text: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const item of splitList(text)) {
    const separator = item.indexOf(':');
    if (separator <= 0) {
      throw ConfigurationError.invalidField('headers', `Header must be name:value, got ${item}`);
    }
    headers[item.slice(0, separator).trim()] = item.slice(separator + 1).trim();
  }
  return headers;
}
