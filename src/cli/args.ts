/**
 * Argument helpers shared by the CLI commands
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors/index.js';
import { ConsoleLogger, NoopLogger, parseLogLevel, type LogLevel, type Logger } from '../observability/index.js';
import { applySubstitutions, parseSubstitutions } from '../request/index.js';
import { Payload, type SignablePayload } from '../signing/index.js';

const EXPIRATION_UNITS = [86400, 3600, 60, 1];

/**
 * Seconds in `days:hours:minutes:seconds`. Fewer fields fill from the
 * left, so `1:12` is one day and twelve hours.
 */
export function parseExpiration(text: string): number {
  const fields = text.trim().split(':');
  if (fields.length === 0 || fields.length > EXPIRATION_UNITS.length || fields.some((f) => !/^\d+$/.test(f))) {
    throw ConfigurationError.invalidField(
      'expiration',
      `Invalid expiration ${JSON.stringify(text)}, expected days:hours:minutes:seconds`
    );
  }
  return fields.reduce((total, field, i) => total + Number(field) * (EXPIRATION_UNITS[i] ?? 0), 0);
}

/**
 * CLI output mode: a logger level, or `raw` to print the formatted response
 * with logging off.
 */
export interface OutputMode {
  readonly level: LogLevel;
  readonly raw: boolean;
}

/**
 * Map `error|warn|info|debug|raw|mute` (plus trace and off)
 */
export function parseOutputMode(text: string): OutputMode {
  const value = text.trim().toLowerCase();
  if (value === 'raw') {
    return { level: 'off', raw: true };
  }
  if (value === 'mute') {
    return { level: 'off', raw: false };
  }
  return { level: parseLogLevel(value), raw: false };
}

export function createCliLogger(level: LogLevel): Logger {
  return level === 'off' ? new NoopLogger() : new ConsoleLogger(level);
}

export interface PayloadArguments {
  /** Body text, or a file name when payloadIsFile is set */
  readonly payload?: string;
  readonly payloadIsFile?: boolean;
  readonly signPayload?: boolean;
  /** `@key=value;...` replacements applied to the body */
  readonly substitutions?: string;
}

/**
 * Resolve the request body. File templates lose their line breaks before
 * substitution.
 */
export async function loadPayload(args: PayloadArguments): Promise<SignablePayload> {
  let data: Uint8Array | undefined;
  if (args.payload !== undefined) {
    const substitutions = args.substitutions ? parseSubstitutions(args.substitutions) : undefined;
    if (args.payloadIsFile) {
      const content = await readFile(args.payload);
      data = substitutions
        ? new TextEncoder().encode(
            applySubstitutions(content.toString('utf8'), substitutions, { stripNewlines: true })
          )
        : new Uint8Array(content);
    } else {
      data = new TextEncoder().encode(
        substitutions ? applySubstitutions(args.payload, substitutions) : args.payload
      );
    }
  }

  if (args.signPayload) {
    return data === undefined ? Payload.empty() : Payload.bytes(data);
  }
  return Payload.unsigned(data);
}
