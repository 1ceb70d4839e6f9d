/**
 * S3 Signature V4 signing and REST client
 *
 * @example
 * ```typescript
 * import { S3RestClient, createConfigFromEnv } from 's3v4-rest';
 *
 * const client = new S3RestClient({ config: createConfigFromEnv() });
 * const response = await client.send({ method: 'GET', bucket: 'photos', key: 'a.txt' });
 * ```
 *
 * @module s3v4-rest
 */

export * from './errors/index.js';
export * from './signing/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './request/index.js';
export * from './transport/index.js';
export * from './response/index.js';
export * from './client/index.js';
export * from './server/index.js';
