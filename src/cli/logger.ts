/**
 * Logger utility with automatic sensitive data redaction.
 *
 * Writes to stderr so stdout stays clean for `--dump` output. Must not be
 * used while the picker owns the screen.
 */

import { Console } from 'node:console';

/** Fields that should be redacted from logs */
const SENSITIVE_FIELDS = new Set(['password', 'passphrase', 'secret', 'token', 'privatekey', 'private_key']);

/**
 * Recursively redacts sensitive fields from an object.
 * Creates a deep copy to avoid modifying the original.
 */
export function redactSensitive<T>(value: T): T;
export function redactSensitive(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item));
  }

  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    result[key] = SENSITIVE_FIELDS.has(key.toLowerCase()) ? '[REDACTED]' : redactSensitive(val);
  }
  return result;
}

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

export interface Logger {
  namespace: string;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Emit debug messages. Off by default. */
  debug?: boolean;
  /** Destination; defaults to a console writing to stderr. */
  sink?: Pick<typeof console, 'info' | 'warn' | 'error' | 'debug'>;
}

export function formatLogLine(level: LogLevel, namespace: string, message: string, data?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level}] [${namespace}]`;
  if (data) {
    return `${prefix} ${message} ${JSON.stringify(redactSensitive(data))}`;
  }
  return `${prefix} ${message}`;
}

/**
 * Creates a namespaced logger that automatically redacts sensitive data.
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? new Console({ stdout: process.stderr, stderr: process.stderr });
  const debugEnabled = options.debug ?? false;

  return {
    namespace,
    info(message, data) {
      sink.info(formatLogLine('INFO', namespace, message, data));
    },
    warn(message, data) {
      sink.warn(formatLogLine('WARN', namespace, message, data));
    },
    error(message, data) {
      sink.error(formatLogLine('ERROR', namespace, message, data));
    },
    debug(message, data) {
      if (debugEnabled) {
        sink.debug(formatLogLine('DEBUG', namespace, message, data));
      }
    },
  };
}
