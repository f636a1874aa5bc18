// ============================================================================
// LOGGER
// ============================================================================
// Console logging in the "[Component] message" form, injectable per component

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  /** Logger for a sub-component, sharing this logger's level */
  child(tag: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a console-backed logger that prefixes every line with `[tag]`
 */
export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const enabled = (target: LogLevel): boolean => LEVEL_RANK[target] >= LEVEL_RANK[level];
  const prefix = `[${tag}]`;

  return {
    debug(message, ...meta) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...meta);
    },
    info(message, ...meta) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...meta);
    },
    warn(message, ...meta) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...meta);
    },
    error(message, ...meta) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...meta);
    },
    child(childTag) {
      return createLogger(childTag, level);
    },
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
