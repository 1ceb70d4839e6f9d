/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createConfigFromEnv,
  credentialsFromConfig,
  endpointFromConfig,
  loadConfigFile,
  parseConfig,
  parseEndpoint,
  parseOverrides,
} from '../index.js';
import { ConfigurationError } from '../../errors/index.js';

const valid = {
  access_key: 'test-access-key',
  secret_key: 'test-secret',
  protocol: 'http',
  host: 'localhost',
  port: 8000,
};

describe('parseConfig', () => {
  it('should accept a valid configuration', () => {
    expect(parseConfig({ ...valid, version: 1 })).toEqual({ ...valid, version: 1 });
  });

  it('should accept a numeric string port', () => {
    expect(parseConfig({ ...valid, port: '9000' }).port).toBe(9000);
  });

  it('should make the port optional', () => {
    const { port: _port, ...withoutPort } = valid;
    expect(parseConfig(withoutPort).port).toBeUndefined();
  });

  it('should reject missing fields', () => {
    const { secret_key: _secret, ...withoutSecret } = valid;
    expect(() => parseConfig(withoutSecret)).toThrow(ConfigurationError);
  });

  it('should reject unknown fields', () => {
    expect(() => parseConfig({ ...valid, region: 'us-east-1' })).toThrow(/region|Unrecognized/);
  });

  it('should reject bad protocols and ports', () => {
    expect(() => parseConfig({ ...valid, protocol: 'ftp' })).toThrow(ConfigurationError);
    expect(() => parseConfig({ ...valid, port: 'eighty' })).toThrow(ConfigurationError);
    expect(() => parseConfig({ ...valid, port: 70000 })).toThrow(ConfigurationError);
  });

  it('should list the failing path in the error', () => {
    try {
      parseConfig({ ...valid, host: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.code).toBe('INVALID_CONFIG');
      expect(error instanceof Error && error.message).toMatch(/^Invalid configuration: host: /);
    }
  });
});

describe('parseOverrides', () => {
  it('should split on the first = only', () => {
    expect(parseOverrides('host=example.com;port=9000;secret_key=a=b')).toEqual({
      host: 'example.com',
      port: '9000',
      secret_key: 'a=b',
    });
  });

  it('should skip empty items', () => {
    expect(parseOverrides('host=h;;')).toEqual({ host: 'h' });
  });

  it('should reject an item without a key', () => {
    expect(() => parseOverrides('=value')).toThrow(ConfigurationError);
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 's3v4-rest-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load and validate a file', async () => {
    const path = join(dir, 'valid.json');
    await writeFile(path, JSON.stringify(valid));

    await expect(loadConfigFile(path)).resolves.toEqual(valid);
  });

  it('should apply overrides before validation', async () => {
    const path = join(dir, 'override.json');
    await writeFile(path, JSON.stringify(valid));

    const config = await loadConfigFile(path, parseOverrides('host=proxy.local;port=8080'));
    expect(config.host).toBe('proxy.local');
    expect(config.port).toBe(8080);
  });

  it('should reject invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "host": ');

    await expect(loadConfigFile(path)).rejects.toThrow('is not valid JSON');
  });

  it('should reject a missing file', async () => {
    await expect(loadConfigFile(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('createConfigFromEnv', () => {
  it('should read S3_* variables', () => {
    const config = createConfigFromEnv({
      S3_ACCESS_KEY: 'test-access-key',
      S3_SECRET_KEY: 'test-secret',
      S3_HOST: 'storage.local',
      S3_PORT: '9000',
    });

    expect(config).toEqual({
      access_key: 'test-access-key',
      secret_key: 'test-secret',
      protocol: 'https',
      host: 'storage.local',
      port: 9000,
    });
  });

  it('should fail without credentials', () => {
    expect(() => createConfigFromEnv({ S3_HOST: 'storage.local' })).toThrow(ConfigurationError);
  });
});

describe('endpointFromConfig', () => {
  it('should keep protocol, host and port', () => {
    expect(endpointFromConfig(parseConfig(valid))).toEqual({ protocol: 'http', host: 'localhost', port: 8000 });
  });
});

describe('parseEndpoint', () => {
  it('should parse endpoint URLs', () => {
    expect(parseEndpoint('http://localhost:8000')).toEqual({ protocol: 'http', host: 'localhost', port: 8000 });
    expect(parseEndpoint('https://s3.example.com')).toEqual({ protocol: 'https', host: 's3.example.com' });
  });

  it('should reject other protocols and garbage', () => {
    expect(() => parseEndpoint('ftp://example.com')).toThrow(ConfigurationError);
    expect(() => parseEndpoint('not a url')).toThrow(ConfigurationError);
  });
});

describe('credentialsFromConfig', () => {
  it('should apply default scope', () => {
    expect(credentialsFromConfig(parseConfig(valid))).toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      region: 'us-east-1',
      service: 's3',
    });
  });

  it('should take an explicit scope', () => {
    expect(credentialsFromConfig(parseConfig(valid), { region: 'eu-west-1' }).region).toBe('eu-west-1');
  });
});
