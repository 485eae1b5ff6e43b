// apps/cli/src/logger.ts
//
// pino logger for the CLI. Logs go to stderr by default so stdout only ever
// carries the game itself.

import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export function createLogger(
  level: LogLevel = 'warn',
  destination: DestinationStream = pino.destination(2),
): Logger {
  return pino({ level }, destination);
}
