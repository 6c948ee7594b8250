import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

// Report output owns stdout, so log lines go to stderr.
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'report-diagnostics', level }, pino.destination(2));
}
