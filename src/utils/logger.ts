import pino from 'pino';
import type { Logger, LoggerOptions as PinoOptions } from 'pino';

export interface LoggerOptions {
  level?: string;
  /** Pretty-print through pino-pretty (development only) */
  pretty?: boolean;
  name?: string;
  /** File descriptor to write JSON lines to (default: stdout) */
  destination?: number;
}

/**
 * Structured logger using pino
 *
 * - ISO timestamps, JSON lines
 * - Level label instead of the numeric level
 * - Connection strings and secrets are redacted if they accidentally get logged
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: PinoOptions = {
    name: options.name ?? 'speaker-embedding-cache',
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: ['*.password', '*.secret', '*.token', '*.url', 'redisUrl'],
      censor: '[REDACTED]',
    },
    transport: options.pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  };

  if (options.destination !== undefined && !options.pretty) {
    return pino(pinoOptions, pino.destination(options.destination));
  }
  return pino(pinoOptions);
}

/** Process-wide default logger */
export const logger = createLogger({
  pretty: process.env['NODE_ENV'] === 'development' && process.stdout.isTTY === true,
});
