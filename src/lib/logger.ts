/**
 * Logger module that writes ONLY to stderr.
 *
 * CRITICAL: Never use console.log in the MCP server - stdout belongs to the
 * protocol when it runs over stdio, and library consumers own their stdout.
 *
 * The minimum level comes from LOG_LEVEL (debug | info | warn | error) and is
 * read on every call so tests and embedding applications can change it.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogData {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function formatMessage(level: LogLevel, msg: string, data?: LogData): string {
  const timestamp = new Date().toISOString();
  const levelUpper = level.toUpperCase().padEnd(5);

  if (data && Object.keys(data).length > 0) {
    return `${timestamp} [${levelUpper}] ${msg} ${JSON.stringify(data)}`;
  }
  return `${timestamp} [${levelUpper}] ${msg}`;
}

function write(level: LogLevel, msg: string, data?: LogData): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }
  console.error(formatMessage(level, msg, data));
}

/**
 * Logger instance - all output goes to stderr only.
 *
 * Usage:
 *   logger.debug('Admission granted', { windowSize: 12 });
 *   logger.warn('Retrying request', { attempt: 2, delayMs: 2000 });
 */
export const logger = {
  /**
   * Debug level - verbose information for development
   */
  debug(msg: string, data?: LogData): void {
    write('debug', msg, data);
  },

  /**
   * Info level - general operational information
   */
  info(msg: string, data?: LogData): void {
    write('info', msg, data);
  },

  /**
   * Warn level - potential issues that don't prevent operation
   */
  warn(msg: string, data?: LogData): void {
    write('warn', msg, data);
  },

  /**
   * Error level - errors that affect operation
   */
  error(msg: string, data?: LogData): void {
    write('error', msg, data);
  },
};

export type { LogLevel, LogData };
