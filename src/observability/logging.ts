/**
 * Structured logging with secret redaction
 */

import { ConfigurationError } from '../errors/index.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'off';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  off: 5,
};

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'off'];

export const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = new Set([
  'secret',
  'secretaccesskey',
  'secret_key',
  'authorization',
  'password',
  'token',
  'sessiontoken',
  'x-amz-security-token',
]);

const SIGNATURE_PATTERN = /(Signature=)[0-9a-fA-F]+/g;

/**
 * Parse a level name, case-insensitive
 */
export function parseLogLevel(text: string): LogLevel {
  const wanted = text.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === wanted);
  if (level === undefined) {
    throw ConfigurationError.invalidField(
      'logLevel',
      `Invalid log level: ${text}. Expected one of ${LOG_LEVELS.join(', ')}`
    );
  }
  return level;
}

/**
 * Mask signatures embedded in a string
 */
export function maskSignatures(text: string): string {
  return text.replace(SIGNATURE_PATTERN, `$1${REDACTED}`);
}

/**
 * Copy a log context with secret-bearing keys replaced
 */
export function redact(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskSignatures(value);
  }
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (value instanceof Uint8Array) {
    return `<${value.byteLength} bytes>`;
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redact(entry);
    }
    return result;
  }
  return value;
}

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  private log(level: Exclude<LogLevel, 'off'>, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(redact(context))}` : '';

    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${maskSignatures(message)}${contextStr}`;

    switch (level) {
      case 'error':
        console.error(logMessage);
        break;
      case 'warn':
        console.warn(logMessage);
        break;
      case 'debug':
      case 'trace':
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * No-op logger for when logging is disabled
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }
}

/**
 * Log a failed operation
 */
export function logError(logger: Logger, operation: string, error: Error): void {
  logger.error(`${operation} failed`, {
    operation,
    errorName: error.name,
    errorMessage: error.message,
  });
}
