/**
 * Structured JSON logger with credential redaction.
 */

import { pino, type DestinationStream, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  /** Defaults to `LOG_LEVEL`, then `info`. */
  level?: string;
  /** Alternate destination, e.g. an in-memory stream in tests. */
  destination?: DestinationStream;
}

export const REDACTED_PATHS = [
  'headers.authorization',
  'req.headers.authorization',
  '*.refreshToken',
  '*.accessToken',
  'refreshToken',
  'accessToken',
];

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = {
    name: 'reddit-relay',
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}
