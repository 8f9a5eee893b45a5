import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const baseOptions: LoggerOptions = {
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['token', 'authorization', 'config.token', 'headers.authorization'],
    censor: '<redacted>',
  },
};

/**
 * The level defaults to `LOG_LEVEL` (read on each call), then `info`.
 * Without a destination, lines go to stdout.
 */
export function createLogger(name: string, options?: LoggerOptions, destination?: DestinationStream): Logger {
  const merged: LoggerOptions = {
    ...baseOptions,
    level: process.env['LOG_LEVEL'] ?? 'info',
    ...options,
    name,
  };
  return destination === undefined ? pino(merged) : pino(merged, destination);
}

export type { Logger };
