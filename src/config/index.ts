/**
 * Configuration module
 * @module s3v4-rest/config
 */

export * from './types.js';
export { configSchema, parseConfig } from './schema.js';
export {
  parseOverrides,
  loadConfigFile,
  createConfigFromEnv,
  endpointFromConfig,
  parseEndpoint,
  credentialsFromConfig,
} from './loader.js';
