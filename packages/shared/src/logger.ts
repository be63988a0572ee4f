/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include the correlation ID and source URL of the
 * record being built, taken from AsyncLocalStorage context.
 */

import { currentScope, getCorrelationId } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const scope = currentScope();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    sourceUrl: scope?.sourceUrl,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) {
      console.log(formatLog('INFO', message, context));
    }
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) {
      console.warn(formatLog('WARN', message, context));
    }
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
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
    if (enabled('debug')) {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
