import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Clinic logger with PII redaction
 * Patient names, birthdays and free-text notes never reach the logs;
 * MRNs and appointment dates do, so every line can be traced to a record.
 */

// Record fields to completely redact, at top level and one level down
export const REDACTED_FIELDS = ['first', 'last', 'birthday', 'note'];

/**
 * Create a redaction config for Pino
 */
function createRedactor() {
  return {
    paths: REDACTED_FIELDS.flatMap((field) => [field, `*.${field}`]),
    censor: '[REDACTED]',
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Where lines are written; stdout when omitted */
  destination?: DestinationStream;
}

/**
 * Create a logger instance with PII redaction
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
    // Use null to omit base, or provide correlationId if present
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Correlation ID shared by every log line of this process run
 */
export const runCorrelationId = generateCorrelationId();

export type { Logger };
