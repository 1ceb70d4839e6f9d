/**
 * Request builder types
 * @module s3v4-rest/request/types
 */

import type { HttpMethod, QueryParameter, SignablePayload } from '../signing/index.js';

/**
 * Source of the signing instant.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * A request as the user describes it, before endpoint and time are known.
 */
export interface RequestInput {
  readonly method: HttpMethod;
  readonly bucket?: string;
  readonly key?: string;
  readonly parameters?: readonly QueryParameter[];
  readonly headers?: Readonly<Record<string, string>>;
  /** Defaults to an empty, hashed body */
  readonly payload?: SignablePayload;
}
