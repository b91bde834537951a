/**
 * Log levels supported by the logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger interface for the proxy.
 * Implement this interface to route proxy logs into your own sink.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Type guard for log level strings (e.g. from `LOG_LEVEL`).
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Convert a caught value into loggable metadata.
 */
export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.name, message: error.message };
  }
  return { error: String(error) };
}

/**
 * Create a console logger with optional level filtering and a component tag.
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param component - Tag printed after the level, e.g. `resolver`
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('debug', 'token');
 * logger.warn('Token endpoint returned an error', { status: 400 });
 * // [WARN] [token] Token endpoint returned an error {"status":400}
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = 'info', component?: string): Logger {
  const prefix = component ? ` [${component}]` : '';

  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= LOG_LEVELS[minLevel];

  const format = (level: LogLevel, message: string, meta?: Record<string, unknown>): string => {
    let suffix = '';
    if (meta) {
      try {
        suffix = ' ' + JSON.stringify(meta);
      } catch {
        suffix = ' [unserializable]';
      }
    }
    return `[${level.toUpperCase()}]${prefix} ${message}${suffix}`;
  };

  return {
    debug(message, meta) {
      if (shouldLog('debug')) console.debug(format('debug', message, meta));
    },
    info(message, meta) {
      if (shouldLog('info')) console.info(format('info', message, meta));
    },
    warn(message, meta) {
      if (shouldLog('warn')) console.warn(format('warn', message, meta));
    },
    error(message, meta) {
      if (shouldLog('error')) console.error(format('error', message, meta));
    },
  };
}

/**
 * No-op logger that discards all log messages.
 * Useful for testing or when logging is not desired.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
