/**
 * Structured Logging with Correlation IDs
 *
 * One JSON object per line. Correlation and document IDs are pulled from the
 * AsyncLocalStorage context, so callers only pass what is specific to the event.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

function formatLog(level: Level, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    documentId: reqContext?.documentId,
    filename: reqContext?.filename,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV === 'development';
}

function silenced(): boolean {
  return process.env.LOG_LEVEL === 'silent';
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (silenced()) return;
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (silenced()) return;
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (silenced()) return;
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
    if (silenced() || !debugEnabled()) return;
    console.debug(formatLog('DEBUG', message, context));
  },
};
