/*
 * Logger
 * ------
 * Minimal leveled logger consumed by every container module. Anything with
 * the five level methods can be plugged in through ContainerConfig.logger;
 * the default writes through `console` with an `[Arbor]` prefix.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export interface ConsoleLoggerOptions {
  /** Text in brackets in front of every line. @default 'Arbor' */
  prefix?: string;
  /**
   * Lowest level written. Falls back to `ARBOR_LOG_LEVEL`, then `warn`.
   */
  level?: LogLevel;
}

/**
 * Create a logger that writes through `console`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ prefix: 'Billing', level: 'debug' });
 * logger.info('Refreshing container', { definitions: 12 });
 * // [Billing] Refreshing container { definitions: 12 }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = `[${options.prefix ?? 'Arbor'}]`;
  const envLevel = typeof process !== 'undefined' ? process.env?.ARBOR_LOG_LEVEL : undefined;
  const level: LogLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
  const threshold = LEVEL_RANK[level];

  const emit =
    (lvl: Exclude<LogLevel, 'silent'>, sink: (...args: unknown[]) => void) =>
    (message: string, context?: LogContext) => {
      if (LEVEL_RANK[lvl] < threshold) return;
      if (context === undefined) sink(`${prefix} ${message}`);
      else sink(`${prefix} ${message}`, context);
    };

  return {
    trace: emit('trace', (...args) => console.debug(...args)),
    debug: emit('debug', (...args) => console.debug(...args)),
    info: emit('info', (...args) => console.info(...args)),
    warn: emit('warn', (...args) => console.warn(...args)),
    error: emit('error', (...args) => console.error(...args)),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  trace: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Normalize a thrown value into something worth logging.
 */
export function errorContext(error: unknown): LogContext {
  if (error instanceof Error) return { error: error.message, errorName: error.name };
  return { error: String(error) };
}
