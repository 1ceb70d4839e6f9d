/**
 * Tests for request parsing and building
 */

import { describe, it, expect } from 'vitest';
import {
  applySubstitutions,
  buildObjectPath,
  buildRequestDescriptor,
  parseHeaderList,
  parseHttpMethod,
  parseParameterList,
  parseSubstitutions,
} from '../index.js';
import { Payload } from '../../signing/index.js';
import { ConfigurationError, EncodingError } from '../../errors/index.js';

describe('parseHttpMethod', () => {
  it('should accept methods in any case', () => {
    expect(parseHttpMethod('get')).toBe('GET');
    expect(parseHttpMethod(' Delete ')).toBe('DELETE');
  });

  it('should reject unsupported methods', () => {
    expect(() => parseHttpMethod('PATCH')).toThrow(ConfigurationError);
  });
});

describe('parseParameterList', () => {
  it('should split on the first = and keep order', () => {
    expect(parseParameterList('a=1;flag=;b=x=y;versions')).toEqual([
      ['a', '1'],
      ['flag', ''],
      ['b', 'x=y'],
      ['versions', ''],
    ]);
  });

  it('should return nothing for an empty list', () => {
    expect(parseParameterList('')).toEqual([]);
  });

  it('should reject an empty name', () => {
    expect(() => parseParameterList('=value')).toThrow(EncodingError);
  });
});

describe('parseHeaderList', () => {
  it('should split on the first colon', () => {
    expect(parseHeaderList('Content-Type:text/plain;x-amz-meta-url:http://h:80')).toEqual({
      'Content-Type': 'text/plain',
      'x-amz-meta-url': 'http://h:80',
    });
  });

  it('should reject items without a name', () => {
    expect(() => parseHeaderList('no-colon')).toThrow(ConfigurationError);
    expect(() => parseHeaderList(':value')).toThrow(ConfigurationError);
  });
});

describe('buildObjectPath', () => {
  it('should build service, bucket and object paths', () => {
    expect(buildObjectPath()).toBe('/');
    expect(buildObjectPath('photos')).toBe('/photos');
    expect(buildObjectPath('photos', '2024/beach.jpg')).toBe('/photos/2024/beach.jpg');
  });

  it('should reject a key without a bucket', () => {
    expect(() => buildObjectPath(undefined, 'orphan.txt')).toThrow(ConfigurationError);
  });
});

describe('buildRequestDescriptor', () => {
  const endpoint = { protocol: 'http', host: 'localhost', port: 9000 } as const;
  const clock = (): Date => new Date('2024-01-02T03:04:05Z');

  it('should assemble a descriptor', () => {
    const request = buildRequestDescriptor(
      {
        method: 'PUT',
        bucket: 'photos',
        key: 'a.txt',
        parameters: [['tagging', '']],
        headers: { 'Content-Type': 'text/plain' },
        payload: Payload.text('hello'),
      },
      endpoint,
      clock
    );

    expect(request).toMatchObject({
      method: 'PUT',
      protocol: 'http',
      host: 'localhost',
      port: 9000,
      path: '/photos/a.txt',
      query: [['tagging', '']],
      headers: { 'Content-Type': 'text/plain', 'content-length': '5' },
    });
    expect(request.timestamp.toISOString()).toBe('2024-01-02T03:04:05.000Z');
  });

  it('should default to an empty payload without content-length', () => {
    const request = buildRequestDescriptor({ method: 'GET' }, endpoint, clock);

    expect(request.path).toBe('/');
    expect(request.payload).toEqual(Payload.empty());
    expect(request.headers).toEqual({});
  });

  it('should keep a caller content-length', () => {
    const request = buildRequestDescriptor(
      { method: 'PUT', bucket: 'b', key: 'k', headers: { 'Content-Length': '5' }, payload: Payload.text('hello') },
      endpoint,
      clock
    );
    expect(request.headers).toEqual({ 'Content-Length': '5' });
  });
});

describe('substitutions', () => {
  it('should parse placeholder lists', () => {
    expect(parseSubstitutions('@id=42;@etag="abc="')).toEqual(
      new Map([
        ['@id', '42'],
        ['@etag', '"abc="'],
      ])
    );
  });

  it('should replace every occurrence', () => {
    const map = parseSubstitutions('@part=1;@tag=etag-1');
    expect(applySubstitutions('<P>@part</P><E>@tag</E><P>@part</P>', map)).toBe(
      '<P>1</P><E>etag-1</E><P>1</P>'
    );
  });

  it('should strip newlines when asked', () => {
    expect(applySubstitutions('<a>\n  @x\r\n</a>\n', new Map([['@x', 'y']]), { stripNewlines: true })).toBe(
      '<a>  y</a>'
    );
  });

  it('should reject malformed items', () => {
    expect(() => parseSubstitutions('missing-equals')).toThrow(ConfigurationError);
  });
});
