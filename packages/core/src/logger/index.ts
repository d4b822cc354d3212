/**
 * Medical-grade Pino logger with PHI redaction
 *
 * Features:
 * - Automatic redaction of patient identifiers and clinical content
 * - Correlation ID support for request tracing
 * - Pretty printing in development
 * - Structured JSON logging in production
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

import { createCensor, REDACTION_PATHS, redactString } from './redaction.js';

export {
  REDACTION_PATHS,
  PII_PATTERNS,
  redactString,
  deepRedactObject,
  shouldRedactPath,
  maskName,
  maskNationalId,
} from './redaction.js';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Logger name, shown as `name` in every line */
  name?: string;
  /** Log level (default: based on NODE_ENV) */
  level?: string;
  /** Service name for log identification */
  serviceName?: string;
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Disable PHI redaction (NOT recommended outside local debugging) */
  disableRedaction?: boolean;
  /** Additional redaction paths */
  additionalRedactionPaths?: string[];
  /** Correlation ID bound to every line */
  correlationId?: string;
  /** Write serialized lines here instead of stdout (no pretty printing) */
  destination?: { write(line: string): void };
}

/**
 * Context that can be attached to log entries
 */
export interface LogContext {
  /** Correlation ID for distributed tracing */
  correlationId?: string;
  /** Report being processed */
  reportId?: string;
  /** Acting clinician */
  actorId?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Get default log level based on environment
 */
function getDefaultLevel(): string {
  const env = process.env.NODE_ENV;
  const envLevel = process.env.LOG_LEVEL;

  if (envLevel) {
    return envLevel;
  }

  switch (env) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

/**
 * Check if running in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
}

/**
 * Create the logger configuration
 */
function createLoggerOptions(config: LoggerConfig = {}): LoggerOptions {
  const {
    level = getDefaultLevel(),
    serviceName = process.env.SERVICE_NAME ?? 'discharge-reports',
    disableRedaction = false,
    additionalRedactionPaths = [],
    correlationId,
  } = config;

  const options: LoggerOptions = {
    level,
    name: config.name ?? serviceName,
    timestamp: pino.stdTimeFunctions.isoTime,

    base: {
      service: serviceName,
      env: process.env.NODE_ENV ?? 'development',
      ...(correlationId ? { correlationId } : {}),
    },

    formatters: {
      level: (label) => ({ level: label }),
    },

    serializers: {
      err: pino.stdSerializers.err,
    },

    messageKey: 'msg',
  };

  if (!disableRedaction) {
    options.redact = {
      paths: [...REDACTION_PATHS, ...additionalRedactionPaths],
      censor: createCensor,
    };
  }

  return options;
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options = createLoggerOptions(config);

  if (config.destination) {
    return pino(options, config.destination);
  }

  const pretty = config.pretty ?? isDevelopment();

  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
        singleLine: false,
      },
    });
    return pino(options, transport);
  }

  return pino(options);
}

/**
 * Create a child logger with context
 */
export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}

/**
 * Default logger instance
 */
export const logger: Logger = createLogger();

/**
 * Create a correlation-aware logger for request handling
 */
export function withCorrelation(
  correlationId: string,
  context: Omit<LogContext, 'correlationId'> = {}
): Logger {
  return createChildLogger(logger, { correlationId, ...context });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Safely log objects that might contain PHI in free-text values
 */
export function safeLog(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (typeof value === 'string') {
      result[key] = redactString(value);
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      result[key] = safeLog(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }

  return result;
}

export type { Logger };
