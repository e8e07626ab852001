/**
 * Structured Logger
 *
 * Uses pino for structured JSON logging with:
 * - Log levels (debug, info, warn, error)
 * - Child loggers with context
 * - Output on stderr, so stdout carries only command results
 */

import pino from 'pino';

const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const options: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

// In production, JSON lines on stderr
// In development, pretty printing via pino-pretty
const logger = pretty
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

// Types for log context
export interface LogContext {
  module?: string;
  sessionId?: string;
  target?: string;
  operation?: string;
}

/**
 * Create a child logger with additional context
 */
export function createLogger(context: LogContext): pino.Logger {
  return logger.child(context);
}

/**
 * Generate a new session ID
 */
export function generateSessionId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

export type Logger = pino.Logger;

// Convenience loggers for common modules
export const sessionLogger = createLogger({ module: 'session' });
export const transportLogger = createLogger({ module: 'transport' });
export const storeLogger = createLogger({ module: 'store' });
export const cliLogger = createLogger({ module: 'cli' });

/**
 * Change the level of the base logger and the module loggers.
 * Children created afterwards inherit it.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  for (const target of [logger, sessionLogger, transportLogger, storeLogger, cliLogger]) {
    target.level = level;
  }
}

export { logger };
export default logger;
