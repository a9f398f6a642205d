/**
 * Shared fixtures for the HTTP layer tests
 */

import type { Logger } from 'pino';
import { createLogger } from '../../backend/logger';
import type { LogLevel } from '../../backend/config';

export type LogRecord = Record<string, unknown>;

export interface CapturedLogs {
  logger: Logger;
  records: LogRecord[];
}

/**
 * Logger that keeps every record in memory, parsed
 */
export function captureLogs(level: LogLevel = 'trace'): CapturedLogs {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level,
    service: 'test-service',
    version: '1.0.0',
    destination: {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  });
  return { logger, records };
}
