/**
 * XML helpers for S3 responses
 * @module s3v4-rest/response/xml
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { ResponseError } from '../errors/index.js';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

/**
 * Parser options keeping document order
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: TEXT_KEY,
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  preserveOrder: true,
};

const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: TEXT_KEY,
  preserveOrder: true,
  format: true,
  indentBy: '   ',
  suppressEmptyNode: true,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Throws ResponseError unless the text is well-formed XML
 */
export function assertValidXml(xml: string): void {
  const result = XMLValidator.validate(xml);
  if (result !== true) {
    throw ResponseError.invalidXml(`${result.err.msg} (line ${result.err.line})`);
  }
}

/**
 * Parse into fast-xml-parser's ordered node list
 */
function parseOrdered(xml: string, removeNSPrefix: boolean): unknown {
  assertValidXml(xml);
  const parser = new XMLParser({ ...PARSER_OPTIONS, removeNSPrefix });
  try {
    const parsed: unknown = parser.parse(xml);
    return parsed;
  } catch (error) {
    throw ResponseError.invalidXml(error);
  }
}

/**
 * Re-indent an XML document
 */
export function prettyPrintXml(xml: string): string {
  const ordered = parseOrdered(xml, false);
  const builder = new XMLBuilder(BUILDER_OPTIONS);
  const built: unknown = builder.build(ordered);
  return String(built).trim();
}

/**
 * Split `.//aws:Part/aws:ETag` into bare element names
 */
function parseQuery(query: string): string[] {
  const segments = query
    .replace(/^\.?\/\//, '')
    .replace(/^\.\//, '')
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.slice(segment.indexOf(':') + 1));
  if (segments.length === 0) {
    throw ResponseError.invalidXml(`Empty XML query: ${JSON.stringify(query)}`);
  }
  return segments;
}

function textOf(children: unknown): string {
  if (!Array.isArray(children)) {
    return '';
  }
  let text = '';
  for (const child of children) {
    if (isRecord(child) && TEXT_KEY in child) {
      text += String(child[TEXT_KEY]);
    }
  }
  return text;
}

function endsWith(path: readonly string[], segments: readonly string[]): boolean {
  if (path.length < segments.length) {
    return false;
  }
  const offset = path.length - segments.length;
  return segments.every((segment, i) => path[offset + i] === segment);
}

function collect(nodes: unknown, segments: readonly string[], path: string[], out: string[]): void {
  if (!Array.isArray(nodes)) {
    return;
  }
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    for (const [name, children] of Object.entries(node)) {
      if (name === ATTRIBUTES_KEY || name === TEXT_KEY) {
        continue;
      }
      path.push(name);
      if (endsWith(path, segments)) {
        out.push(textOf(children));
      }
      collect(children, segments, path, out);
      path.pop();
    }
  }
}

/**
 * Find element text by a simple path query such as `.//aws:UploadId`,
 * `//UploadId` or `Part/ETag`. Namespace prefixes are ignored; matches are
 * returned in document order.
 */
export function findXmlValues(xml: string, query: string): string[] {
  const segments = parseQuery(query);
  const values: string[] = [];
  collect(parseOrdered(xml, true), segments, [], values);
  return values;
}
