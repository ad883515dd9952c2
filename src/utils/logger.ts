/**
 * Logger factory for the model generator
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import type { LoggingConfig } from '../types/index.js';

export const LOGGER_NAME = 'ovsdb-modelgen';

/**
 * Creates a pino logger from logging configuration.
 *
 * The `text` format pretty-prints through pino-pretty unless an explicit
 * destination is given, in which case records are written to it as JSON.
 */
export function createLogger(config: LoggingConfig, destination?: DestinationStream): Logger {
  const transport =
    config.format === 'text' && destination === undefined
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

  return pino(
    {
      name: LOGGER_NAME,
      level: config.level,
      timestamp: config.includeTimestamp ? pino.stdTimeFunctions.isoTime : false,
      serializers: {
        err: config.includeStackTrace ? pino.stdSerializers.err : serializeErrorWithoutStack,
      },
      ...(transport && { transport }),
    },
    destination
  );
}

function serializeErrorWithoutStack(error: Error): Record<string, unknown> {
  const { stack: _stack, ...rest } = pino.stdSerializers.err(error);
  return rest;
}

/**
 * Logger that discards every record, used when callers pass none
 */
export function createSilentLogger(): Logger {
  return pino({ name: LOGGER_NAME, enabled: false });
}
