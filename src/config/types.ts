/**
 * Configuration types
 * @module s3v4-rest/config/types
 */

/**
 * Endpoint and credentials file contents, after validation.
 *
 * Field names follow the JSON file format.
 */
export interface S3RestConfig {
  readonly version?: string | number;
  readonly access_key: string;
  readonly secret_key: string;
  readonly protocol: 'http' | 'https';
  readonly host: string;
  readonly port?: number;
}

/**
 * Where requests are sent.
 */
export interface Endpoint {
  readonly protocol: 'http' | 'https';
  readonly host: string;
  readonly port?: number;
}

/**
 * Credential scope defaults
 */
export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_SERVICE = 's3';

/**
 * Environment variables read by createConfigFromEnv.
 */
export const ENV_VARS = {
  ACCESS_KEY: 'S3_ACCESS_KEY',
  SECRET_KEY: 'S3_SECRET_KEY',
  PROTOCOL: 'S3_PROTOCOL',
  HOST: 'S3_HOST',
  PORT: 'S3_PORT',
} as const;
