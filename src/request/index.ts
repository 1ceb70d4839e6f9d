/**
 * Request builder module
 * @module s3v4-rest/request
 */

export * from './types.js';
export { parseHttpMethod, parseParameterList, parseHeaderList } from './parse.js';
export { buildObjectPath, buildRequestDescriptor } from './builder.js';
export { parseSubstitutions, applySubstitutions, type SubstitutionOptions } from './template.js';
