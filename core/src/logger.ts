export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

/**
 * Minimal structured logger. `globalThis.console` satisfies it, which is what
 * the CLI passes in. Library code receives a `Partial<Logger>` and calls each
 * method with optional chaining so callers can silence individual levels.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export const noopLogger: Partial<Logger> = {};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Wraps a logger so that messages below `level` are dropped.
 */
export function withLogLevel(logger: Partial<Logger>, level: LogLevel): Partial<Logger> {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  return {
    debug: enabled('debug') ? logger.debug?.bind(logger) : undefined,
    info: enabled('info') ? logger.info?.bind(logger) : undefined,
    warn: enabled('warn') ? logger.warn?.bind(logger) : undefined,
    error: logger.error?.bind(logger),
  };
}
