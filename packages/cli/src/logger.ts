/**
 * CLI logger
 *
 * Logs go to stderr so stdout carries only command output.
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import type { CliConfig } from './config.js';

export function createLogger(
  config: Pick<CliConfig, 'logLevel'>,
  destination: DestinationStream = pino.destination({ dest: 2, sync: true })
): Logger {
  return pino(
    {
      name: 'dcc',
      level: config.logLevel,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}
