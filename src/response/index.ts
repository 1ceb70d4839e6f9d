/**
 * Response formatting and search
 * @module s3v4-rest/response
 */

export {
  DEFAULT_MAX_BINARY_BYTES,
  formatResponse,
  formatContent,
  pickHeaders,
  findHeader,
  isSuccessStatus,
  type FormatOptions,
} from './format.js';
export { assertValidXml, prettyPrintXml, findXmlValues } from './xml.js';
