/**
 * Payload template substitution
 * @module s3v4-rest/request/template
 */

import { ConfigurationError } from '../errors/index.js';

export interface SubstitutionOptions {
  /** Remove line breaks before substituting */
  readonly stripNewlines?: boolean;
}

/**
 * Parse `@a=1;@b=2`. Only the first `=` separates placeholder from value.
 */
export function parseSubstitutions(text: string): Map<string, string> {
  const substitutions = new Map<string, string>();
  for (const item of text.split(';')) {
    if (!item) {
      continue;
    }
    const separator = item.indexOf('=');
    if (separator <= 0) {
      throw ConfigurationError.invalidField('substitutions', `Substitution must be key=value, got ${item}`);
    }
    substitutions.set(item.slice(0, separator), item.slice(separator + 1));
  }
  return substitutions;
}

/**
 * Replace every literal occurrence of each key, in insertion order
 */
export function applySubstitutions(
  text: string,
  substitutions: ReadonlyMap<string, string>,
  options: SubstitutionOptions = {}
): string {
  let result = options.stripNewlines ? text.replace(/\r?\n/g, '') : text;
  for (const [key, value] of substitutions) {
    result = result.split(key).join(value);
  }
  return result;
}
