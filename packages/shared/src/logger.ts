/**
 * Structured Logging with Correlation IDs
 *
 * Every line is a JSON object carrying the correlation ID and document ID
 * of the active AsyncLocalStorage context.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    documentId: reqContext?.documentId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function serializeError(error: unknown): { message: string; name: string; stack?: string } | string {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
  }
  return String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    const errorContext = {
      ...context,
      error: serializeError(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
