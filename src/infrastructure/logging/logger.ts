/**
 * @extensor/core - Logger
 *
 * Structured logging with pino. `LOG_LEVEL` selects the level
 * (default: info).
 */

import pino, { DestinationStream, Logger, LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

/**
 * Logger creation options
 */
export interface LoggerOptions {
  /** Minimum level; falls back to LOG_LEVEL, then 'info' */
  level?: LevelWithSilent;

  /** Logger name bound to every record */
  name?: string;

  /** Output stream; stdout when omitted */
  destination?: DestinationStream;
}

/**
 * Create a pino logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.child({ serviceType: 'Language' }).debug('scanning');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const config = { name: options.name ?? 'extensor', level };

  return options.destination ? pino(config, options.destination) : pino(config);
}

let defaultLogger: Logger | undefined;

/**
 * Lazily created process logger
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
