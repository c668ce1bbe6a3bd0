/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context.
 * LOG_LEVEL (debug | info | warn | error | silent) sets the minimum level written.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function thresholdFromEnv(): number {
  switch ((process.env.LOG_LEVEL || '').toLowerCase()) {
    case 'debug':
      return LEVEL_ORDER.DEBUG;
    case 'warn':
      return LEVEL_ORDER.WARN;
    case 'error':
      return LEVEL_ORDER.ERROR;
    case 'silent':
      return Number.POSITIVE_INFINITY;
    case 'info':
      return LEVEL_ORDER.INFO;
    default:
      return process.env.NODE_ENV === 'production' ? LEVEL_ORDER.INFO : LEVEL_ORDER.DEBUG;
  }
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= thresholdFromEnv();
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentId: reqContext?.documentId,
    jobId: reqContext?.jobId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('INFO')) {
      console.log(formatLog('INFO', message, context));
    }
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('WARN')) {
      console.warn(formatLog('WARN', message, context));
    }
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('ERROR')) {
      return;
    }
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('DEBUG')) {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
