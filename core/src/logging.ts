/**
 * Structured logging for write and read sessions
 *
 * Writers and readers take a {@link Logger} and report session milestones
 * (open, batch flush/load, close) with a structured {@link LogContext}.
 * The default is {@link createNoopLogger}; applications opt in through
 * configuration or by passing their own logger.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@orcbatch/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });
 * const sessionLogger = withContext(logger, { path: 'quotes.orc' });
 * sessionLogger.info('Writer closed', { rowsWritten: 3, batchesFlushed: 1 });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible values allowed in log context.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to a log entry.
 */
export interface LogContext {
  /** File path of the session */
  path?: string;
  /** Session kind, `writer` or `reader` */
  session?: string;
  /** Row number within the file */
  row?: number;
  /** Ordinal of the batch within the file */
  batch?: number;
  /** Rows in the batch being flushed or loaded */
  batchRows?: number;
  rowsWritten?: number;
  rowsRead?: number;
  batchesFlushed?: number;
  /** Engine operation, e.g. `writeBatch` */
  operation?: string;
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

export function isLogContextValue(value: unknown): value is LogContextValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isLogContextValue);
      }
      return Object.values(value).every(isLogContextValue);
    default:
      return false;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum level to emit (default: 'debug') */
  minLevel?: LogLevel;
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps every entry for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Create a logger that hands every entry at or above `minLevel` to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }
    output(entry);
  };

  return {
    debug(message, context) {
      log('debug', message, context);
    },
    info(message, context) {
      log('info', message, context);
    },
    warn(message, context) {
      log('warn', message, context);
    },
    error(message, error, context) {
      log('error', message, context, error);
    },
  };
}

/**
 * Render an entry as a single line, either JSON or `[time] LEVEL message {context}`.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          ...('code' in entry.error && { code: String(entry.error.code) }),
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\n  ${entry.error.stack}`;
    }
  }
  return line;
}

export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      console.log(formatLogEntry(entry, format));
    },
  });
}

export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * const writer = openRowWriter(engine, 'quotes.orc', schema, { logger });
 * writer.close();
 * expect(logger.getLogsByLevel('info')).toHaveLength(1);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs() {
      return [...logs];
    },
    getLogsByLevel(level) {
      return logs.filter((entry) => entry.level === level);
    },
    clear() {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Wrap `logger` so every entry carries `context`; per-call context wins on
 * key collisions.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (local?: LogContext): LogContext =>
    local === undefined ? context : { ...context, ...local };

  return {
    debug(message, local) {
      logger.debug(message, merge(local));
    },
    info(message, local) {
      logger.info(message, merge(local));
    },
    warn(message, local) {
      logger.warn(message, merge(local));
    },
    error(message, error, local) {
      logger.error(message, error, merge(local));
    },
  };
}
