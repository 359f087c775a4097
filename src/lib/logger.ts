/**
 * Pino logger configuration and helpers
 *
 * Thin wrapper around Pino; components receive a `Logger` and derive
 * `logger.child({ component })` from it.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: string;
  environment?: string;
  pretty?: boolean;
  name?: string;
  version?: string;
  /** Write to this stream instead of stdout; disables pretty printing */
  destination?: DestinationStream;
}

/**
 * Paths masked in every log line. Registry credentials travel in
 * `X-Registry-Auth` and in `auth` option fields.
 */
export const REDACTED_PATHS = [
  'password',
  'token',
  'secret',
  'authorization',
  'auth',
  'identitytoken',
  '*.password',
  '*.token',
  '*.auth',
  '*.identitytoken',
  'headers.authorization',
  'headers["x-registry-auth"]',
  'headers["X-Registry-Auth"]',
  'request.headers["X-Registry-Auth"]',
];

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const environment = config.environment ?? process.env.NODE_ENV;
  const level =
    config.level ?? process.env.LOG_LEVEL ?? (environment === 'development' ? 'debug' : 'info');

  const options: LoggerOptions = {
    name: config.name ?? 'docker-tenant-gateway',
    level,
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
    base: {
      pid: process.pid,
      hostname: process.env.HOSTNAME ?? 'localhost',
      version: config.version,
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (config.destination) {
    return pino(options, config.destination);
  }

  if (environment === 'development' && config.pretty !== false) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause',
        },
      },
    });
  }

  return pino(options);
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.info(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
      return duration;
    },
  };
}
