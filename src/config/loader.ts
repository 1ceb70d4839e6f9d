/**
 * Configuration loading from files, overrides and the environment
 * @module s3v4-rest/config/loader
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors/index.js';
import type { Credentials } from '../signing/index.js';
import { parseConfig } from './schema.js';
import {
  DEFAULT_REGION,
  DEFAULT_SERVICE,
  ENV_VARS,
  type Endpoint,
  type S3RestConfig,
} from './types.js';

/**
 * Parse `key=value;key2=value2`. Values are kept verbatim; only the first
 * `=` separates key from value.
 */
export function parseOverrides(text: string): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const item of text.split(';')) {
    if (!item.trim()) {
      continue;
    }
    const separator = item.indexOf('=');
    const key = (separator < 0 ? item : item.slice(0, separator)).trim();
    if (!key) {
      throw ConfigurationError.invalidField('overrides', `Override without a key: ${item}`);
    }
    overrides[key] = separator < 0 ? '' : item.slice(separator + 1);
  }
  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and validate a JSON configuration file
 */
export async function loadConfigFile(
  path: string,
  overrides?: Readonly<Record<string, string>>
): Promise<S3RestConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError({
      message: `Cannot read configuration file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      code: 'CONFIG_READ_FAILED',
      details: { path },
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError({
      message: `Configuration file ${path} is not valid JSON`,
      code: 'INVALID_CONFIG',
      details: { path },
      cause: error,
    });
  }
  if (!isRecord(raw)) {
    throw ConfigurationError.invalidField('config', `Configuration file ${path} must hold a JSON object`);
  }

  return parseConfig({ ...raw, ...overrides });
}

/**
 * Create configuration from S3_* environment variables
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): S3RestConfig {
  const raw: Record<string, string> = {
    protocol: env[ENV_VARS.PROTOCOL] ?? 'https',
  };
  const accessKey = env[ENV_VARS.ACCESS_KEY];
  const secretKey = env[ENV_VARS.SECRET_KEY];
  const host = env[ENV_VARS.HOST];
  const port = env[ENV_VARS.PORT];
  if (accessKey !== undefined) raw['access_key'] = accessKey;
  if (secretKey !== undefined) raw['secret_key'] = secretKey;
  if (host !== undefined) raw['host'] = host;
  if (port) raw['port'] = port;
  return parseConfig(raw);
}

/**
 * Endpoint part of a configuration
 */
export function endpointFromConfig(config: S3RestConfig): Endpoint {
  return config.port === undefined
    ? { protocol: config.protocol, host: config.host }
    : { protocol: config.protocol, host: config.host, port: config.port };
}

/**
 * Parse an endpoint URL such as `http://localhost:8000`
 */
export function parseEndpoint(url: string): Endpoint {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ConfigurationError({
      message: `Invalid endpoint URL: ${url}`,
      code: 'INVALID_FIELD',
      details: { field: 'endpoint' },
      cause: error,
    });
  }
  const protocol = parsed.protocol.replace(/:$/, '');
  if (protocol !== 'http' && protocol !== 'https') {
    throw ConfigurationError.invalidField('endpoint', `Unsupported endpoint protocol: ${protocol}`);
  }
  return parsed.port
    ? { protocol, host: parsed.hostname, port: Number(parsed.port) }
    : { protocol, host: parsed.hostname };
}

/**
 * Signing credentials from a configuration
 */
export function credentialsFromConfig(
  config: S3RestConfig,
  scope: { region?: string; service?: string } = {}
): Credentials {
  return {
    accessKeyId: config.access_key,
    secretAccessKey: config.secret_key,
    region: scope.region ?? DEFAULT_REGION,
    service: scope.service ?? DEFAULT_SERVICE,
  };
}
