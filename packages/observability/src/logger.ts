import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Level from LOG_LEVEL (default info)
 * - ISO 8601 timestamps
 * - Standard error serialization under `err`
 *
 * Pass a destination to capture output, e.g. in tests.
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
