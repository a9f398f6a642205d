/**
 * Logger Configuration
 *
 * Builds pino loggers with environment-aware formatting:
 * - JSON output for log aggregation (ELK, Datadog, CloudWatch)
 * - Pretty-printed colorized output for local development
 *
 * There is no process-wide logger: create one at startup and pass it to the
 * components that log.
 *
 * Usage:
 *   const logger = createLogger({ level: 'info', service: 'users', version: '1.4.0' });
 *   logger.info({ userId: '123' }, 'User logged in');
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { LogLevel } from './config';

export interface LoggerSettings {
  level: LogLevel;
  service: string;
  version: string;
  /** Pretty-print through pino-pretty (ignored when a destination is given) */
  pretty?: boolean;
  /** Write records here instead of stdout */
  destination?: DestinationStream;
}

/**
 * Fields removed from every record
 */
const REDACTED_PATHS = [
  'request.headers.authorization',
  'request.headers.cookie',
  'request.headers["access-token"]',
  'password',
  'apiKey',
  'token',
  'secret',
  '*.password',
  '*.apiKey',
  '*.token',
  '*.secret',
];

/**
 * Create a logger. Records carry ISO timestamps, the level label and the
 * service name and version.
 */
export function createLogger(settings: LoggerSettings): Logger {
  const options: LoggerOptions = {
    level: settings.level,
    base: {
      service: settings.service,
      version: settings.version,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: REDACTED_PATHS,
      remove: true,
    },
  };

  if (settings.destination !== undefined) {
    return pino({ ...options, formatters: { level: (label) => ({ level: label }) } }, settings.destination);
  }

  if (settings.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname,service,version',
          singleLine: false,
        },
      },
    });
  }

  return pino({ ...options, formatters: { level: (label) => ({ level: label }) } });
}

/**
 * Serialize an error for structured logging, following its cause chain
 */
export function serializeError(err: unknown, includeStack = false): Record<string, unknown> {
  if (!(err instanceof Error)) {
    return { message: String(err) };
  }

  // Extract additional properties from custom error classes; nested errors
  // other than the cause (such as a sentinel origin) are left out
  const extras: Record<string, unknown> = {};
  for (const key of Object.getOwnPropertyNames(err)) {
    if (['name', 'message', 'stack', 'cause'].includes(key)) continue;
    const value: unknown = Reflect.get(err, key);
    if (!(value instanceof Error)) {
      extras[key] = value;
    }
  }

  return {
    type: err.name,
    message: err.message,
    ...(includeStack && { stack: err.stack }),
    ...extras,
    ...(err.cause !== undefined && { cause: serializeError(err.cause, includeStack) }),
  };
}
