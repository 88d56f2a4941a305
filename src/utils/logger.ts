/**
 * Root logger factory
 *
 * Components receive a Logger and derive `logger.child({ component })`.
 */

import pino from 'pino';
import type { DestinationStream, Logger, LevelWithSilent, LoggerOptions as PinoOptions } from 'pino';

export interface LoggerOptions {
  level: LevelWithSilent;
  name?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions): Logger {
  const pinoOptions: PinoOptions = {
    name: options.name ?? 'visit-ledger',
    level: options.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    redact: ['*.password', 'config.redisPassword'],
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}
