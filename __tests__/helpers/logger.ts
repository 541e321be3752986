import pino from 'pino';
import type { Logger } from '../../src/core/logger.js';

export interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export const silentLogger: Logger = pino({ level: 'silent' });

/**
 * Logger that keeps every line it writes, parsed
 */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino({ level: 'trace' }, {
    write(line: string) {
      entries.push(JSON.parse(line));
    }
  });
  return { logger, entries };
}

export const LEVEL = { info: 30, warn: 40, error: 50, fatal: 60 } as const;
