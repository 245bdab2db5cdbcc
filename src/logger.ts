/**
 * @module
 * Logging contract for the pool and iterator. The library never writes to
 * the console on its own: it logs through whatever `Logger` it is given and
 * defaults to `noopLogger`.
 */

/**
 * Logger interface for pool and iterator logging.
 * Compatible with common logging libraries like winston, pino, console, etc.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export type LogLevel = keyof Logger;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggerOptions {
  /**
   * Messages below this level are dropped.
   * @default 'info'
   */
  level?: LogLevel;
  /**
   * Where accepted messages go.
   * @default console
   */
  sink?: Logger;
}

/**
 * Creates a `Logger` that forwards to `console` (or another sink) and drops
 * everything below `level`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? console;

  const forward = (level: LogLevel) => (message: string, ...args: unknown[]) => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink[level](message, ...args);
  };

  return {
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  };
}

/**
 * Returns a child logger that appends `fields` as the last argument of every
 * call, e.g. to tag all lines of one streaming request with its id.
 *
 * @example
 * ```typescript
 * const requestLogger = withLogContext(logger, { requestId: randomUUID() });
 * const iterator = new DynamicStreamingIterator(tasks, { logger: requestLogger });
 * ```
 */
export function withLogContext(logger: Logger, fields: Record<string, unknown>): Logger {
  return {
    debug: (message, ...args) => logger.debug(message, ...args, fields),
    info: (message, ...args) => logger.info(message, ...args, fields),
    warn: (message, ...args) => logger.warn(message, ...args, fields),
    error: (message, ...args) => logger.error(message, ...args, fields),
  };
}
