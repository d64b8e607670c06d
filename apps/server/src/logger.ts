/**
 * Console logging with a per-environment floor.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Creates a logger that writes to the console at or above `level`.
 * Every line is prefixed with the scope, e.g. `[server] listening`.
 */
export function createLogger(scope: string, level: LogLevel): Logger {
  const enabled = (wanted: LogLevel): boolean => LEVEL_RANK[wanted] >= LEVEL_RANK[level];
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (enabled('debug')) {
        console.debug(`${prefix} ${message}`);
      }
    },
    info(message) {
      if (enabled('info')) {
        console.info(`${prefix} ${message}`);
      }
    },
    warn(message) {
      if (enabled('warn')) {
        console.warn(`${prefix} ${message}`);
      }
    },
    error(message, error) {
      if (!enabled('error')) {
        return;
      }
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, error);
      }
    },
  };
}

/**
 * Development logs debug output; production starts at info.
 */
export function logLevelFor(env: 'production' | 'development'): LogLevel {
  return env === 'production' ? 'info' : 'debug';
}
