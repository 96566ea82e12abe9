import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '@testbridge/core';

/**
 * Root logger for CLI runs. Logs go to stderr so stdout stays free for
 * command output.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'testbridge', level }, pino.destination(2));
}
