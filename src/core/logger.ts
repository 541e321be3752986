/**
 * Logger Module
 *
 * Configures structured logging using Pino.
 * Console output is pretty-printed and colored in development and JSON in
 * production. Every run also appends human-readable, timestamped lines to
 * the run log file so operators can audit past runs.
 */

import pino, { type Logger } from 'pino';
import type { RunConfig } from './config.js';

export type { Logger };

const TIME_FORMAT = 'SYS:yyyy-mm-dd HH:MM:ss';

/** JSON to stdout, for messages logged before the configuration is read */
export const bootstrapLogger: Logger = pino({ level: 'info' });

/**
 * Creates the run logger
 *
 * - Console: pino-pretty in development, raw JSON when NODE_ENV=production
 * - File: pino-pretty without colors, appended to `paths.logFile`
 */
export function createLogger(config: Pick<RunConfig, 'logLevel' | 'paths'>): Logger {
  const level = config.logLevel;
  const consoleTarget: pino.TransportTargetOptions = process.env.NODE_ENV !== 'production'
    ? { target: 'pino-pretty', level, options: { colorize: true, translateTime: TIME_FORMAT, ignore: 'pid,hostname' } }
    : { target: 'pino/file', level, options: { destination: 1 } };

  return pino({
    level,
    transport: {
      targets: [
        consoleTarget,
        {
          target: 'pino-pretty',
          level,
          options: {
            destination: config.paths.logFile,
            mkdir: true,
            append: true,
            colorize: false,
            translateTime: TIME_FORMAT,
            ignore: 'pid,hostname'
          }
        }
      ]
    }
  });
}
