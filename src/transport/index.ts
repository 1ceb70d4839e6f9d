/**
 * Transport module
 * @module s3v4-rest/transport
 */

export type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
export { UndiciTransport, DEFAULT_TIMEOUT_MS, type UndiciTransportOptions } from './undici-transport.js';
