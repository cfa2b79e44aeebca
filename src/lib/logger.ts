/**
 * Scoped console logger
 *
 * Lines look like `[INFO] [curiosity] message {"meta":1}`. Components take
 * a Logger in their dependencies so tests can pass a silent one.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = 'info';

/**
 * Set the process-wide minimum level (from LOG_LEVEL at startup)
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function format(
  level: LogLevel,
  scope: string,
  msg: string,
  meta?: Record<string, unknown>
): string {
  const line = `[${level.toUpperCase()}] [${scope}] ${msg}`;
  return meta ? `${line} ${JSON.stringify(meta)}` : line;
}

/**
 * Create a logger that prefixes every line with `scope`
 */
export function createLogger(scope: string): Logger {
  function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
  }

  return {
    debug(msg, meta) {
      if (enabled('debug')) {
        console.log(format('debug', scope, msg, meta));
      }
    },
    info(msg, meta) {
      if (enabled('info')) {
        console.log(format('info', scope, msg, meta));
      }
    },
    warn(msg, meta) {
      if (enabled('warn')) {
        console.warn(format('warn', scope, msg, meta));
      }
    },
    error(msg, meta) {
      if (enabled('error')) {
        console.error(format('error', scope, msg, meta));
      }
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
