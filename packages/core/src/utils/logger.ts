/**
 * Logger
 *
 * Bracket-prefixed console logging, e.g. `[Filewire:Receiver] Listening on 0.0.0.0:9876`.
 * Services take a `Logger` so tests and embedders can silence or capture output.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Defaults to the global console */
  sink?: Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const sink = options.sink ?? console;
  const prefix = `[Filewire:${component}]`;
  const enabled = (level: LogLevel) => LEVEL_RANK[level] >= threshold;

  return {
    debug(message, ...args) {
      if (enabled('debug')) sink.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) sink.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) sink.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) sink.error(`${prefix} ${message}`, ...args);
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' });

/**
 * Render an unknown thrown value for a log line.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
