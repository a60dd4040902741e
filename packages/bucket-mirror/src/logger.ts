/**
 * pino logger factory.
 *
 * Logs go to stderr so stdout carries only the run summary. Pretty output
 * through pino-pretty is meant for interactive terminals.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  level: string;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  if (options.pretty) {
    return pino({
      name: 'bucket-mirror',
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ name: 'bucket-mirror', level: options.level }, pino.destination(2));
}
