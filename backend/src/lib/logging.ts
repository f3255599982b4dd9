/**
 * Structured logging for the reclamation backend.
 * JSON lines in production (shipped to CloudWatch by the Lambda runtime),
 * human-readable lines everywhere else.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogMeta = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  meta?: LogMeta;
}

/**
 * Minimal logging surface accepted by the engine components.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  audit(action: string, details?: LogMeta): void;
  performance(operation: string, duration: number, meta?: LogMeta): void;
}

function resolveLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

const currentLevel = resolveLevel(process.env.LOG_LEVEL);

const isProduction = process.env.NODE_ENV === 'production';

function formatMessage(level: string, message: string, meta?: LogMeta): string {
  const timestamp = new Date().toISOString();

  const logEntry: LogEntry = {
    timestamp,
    level,
    message,
    ...(meta && { meta }),
  };

  if (isProduction) {
    return JSON.stringify(logEntry);
  }

  const metaStr = meta ? ` ${JSON.stringify(meta, null, 2)}` : '';
  return `${timestamp} [${level}] ${message}${metaStr}`;
}

function shouldLog(level: LogLevel): boolean {
  return currentLevel <= level;
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return String(error);
}

export const logger = {
  debug(message: string, meta?: LogMeta) {
    if (shouldLog(LogLevel.DEBUG)) {
      console.debug(formatMessage('DEBUG', message, meta));
    }
  },

  info(message: string, meta?: LogMeta) {
    if (shouldLog(LogLevel.INFO)) {
      console.info(formatMessage('INFO', message, meta));
    }
  },

  warn(message: string, meta?: LogMeta) {
    if (shouldLog(LogLevel.WARN)) {
      console.warn(formatMessage('WARN', message, meta));
    }
  },

  error(message: string, error?: unknown, meta?: LogMeta) {
    if (shouldLog(LogLevel.ERROR)) {
      const errorMeta: LogMeta =
        error === undefined || error === null ? { ...meta } : { ...meta, error: describeError(error) };
      console.error(formatMessage('ERROR', message, errorMeta));
    }
  },

  // Every mutating cloud call goes through here
  audit(action: string, details?: LogMeta) {
    logger.info(`AUDIT: ${action}`, {
      type: 'audit',
      action,
      ...details,
    });
  },

  performance(operation: string, duration: number, meta?: LogMeta) {
    logger.info(`PERFORMANCE: ${operation} completed in ${duration}ms`, {
      type: 'performance',
      operation,
      duration,
      ...meta,
    });
  },
};

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  audit: () => undefined,
  performance: () => undefined,
};

export default logger;
