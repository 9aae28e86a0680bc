import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logger for the context engine
 *
 * Credentials and connection secrets never reach the log stream: the fields
 * below are censored wherever they appear one level deep in a log object.
 */

const REDACTED_FIELDS = [
  'password',
  'secret',
  'token',
  'apiKey',
  'api_key',
  'authorization',
  'cookie',
  'serviceKey',
  'service_key',
];

function createRedactor(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACTED_FIELDS, ...REDACTED_FIELDS.map((field) => `*.${field}`)],
    censor: '[REDACTED]',
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

/**
 * Create a named logger instance
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId, destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

// Default logger instance
export const logger = createLogger({ name: 'context-engine' });

export type { Logger };
