/**
 * Logger - Context-prefixed console logging with a process-wide level
 *
 * Each module creates its own logger once at import time:
 *
 * ```typescript
 * const logger = createLogger('IconLocator');
 * logger.info('Found favicon:', assetPath);
 * ```
 *
 * Output is prefixed with the context name. The minimum level comes from
 * the LOG_LEVEL environment variable (error, warn, info, debug) and can be
 * changed at runtime with setLogLevel().
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

/**
 * Parse a level name (case-insensitive). Unknown or empty names give the fallback.
 */
export function parseLogLevel(value: string | undefined, fallback = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  return LEVEL_NAMES[value.trim().toLowerCase()] ?? fallback;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

/**
 * Create a logger that prefixes every line with `[context]`
 */
export function createLogger(context: string): Logger {
  const prefix = `[${context}]`;

  return {
    error: (...args: unknown[]) => {
      if (currentLevel >= LogLevel.ERROR) {
        console.error(prefix, ...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (currentLevel >= LogLevel.WARN) {
        console.warn(prefix, ...args);
      }
    },
    info: (...args: unknown[]) => {
      if (currentLevel >= LogLevel.INFO) {
        console.log(prefix, ...args);
      }
    },
    debug: (...args: unknown[]) => {
      if (currentLevel >= LogLevel.DEBUG) {
        console.log(prefix, '[DEBUG]', ...args);
      }
    },
  };
}
