/**
 * Tagged logger — structured console logging with a service tag.
 *
 * Usage:
 *   const log = createLogger('HistoryStore');
 *   log.info('Evicted items', { count: 3 });
 *   log.error('Insert failed', err);
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Case-insensitive level name, or null for anything else */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  const name = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === name) ?? null;
}

/**
 * Global log level. CLIPKEEP_LOG_LEVEL covers startup, before the settings
 * table is open; afterwards it follows the `logLevel` setting.
 */
let globalLogLevel: LogLevel = parseLogLevel(process.env.CLIPKEEP_LOG_LEVEL) ?? 'info';

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Create a tagged logger for a service or module.
 *
 * @param tag - e.g. 'Monitor', 'HistoryStore'
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const shouldLog = (level: LogLevel): boolean => LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[globalLogLevel];

  return {
    debug(message: string, ...args: unknown[]) {
      if (shouldLog('debug')) console.debug(new Date().toISOString(), prefix, message, ...args);
    },
    info(message: string, ...args: unknown[]) {
      if (shouldLog('info')) console.log(new Date().toISOString(), prefix, message, ...args);
    },
    warn(message: string, ...args: unknown[]) {
      if (shouldLog('warn')) console.warn(new Date().toISOString(), prefix, message, ...args);
    },
    error(message: string, ...args: unknown[]) {
      if (shouldLog('error')) console.error(new Date().toISOString(), prefix, message, ...args);
    },
  };
}
