/**
 * Structured logging for values-schema
 *
 * Messages go to stderr so that `--dry-run` output on stdout stays clean JSON.
 * Debug output is enabled with VALUES_SCHEMA_DEBUG=1 or an explicit level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogCategory =
  | 'values'
  | 'annotation'
  | 'reference'
  | 'validation'
  | 'config'
  | 'output';

export interface Logger {
  readonly level: LogLevel;
  debug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void;
  info(category: LogCategory, message: string): void;
  warn(category: LogCategory, message: string, error?: Error): void;
  error(category: LogCategory, message: string, error?: Error): void;
}

export interface LoggerOptions {
  /** Minimum level written (default: from environment, else 'info') */
  level?: LogLevel;
  /** Sink for formatted lines (default: console.error) */
  write?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Narrow an arbitrary string (CLI flag, config value) to a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level implied by the environment: VALUES_SCHEMA_DEBUG=1 means debug
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return env.VALUES_SCHEMA_DEBUG === '1' ? 'debug' : 'info';
}

/**
 * Create a logger writing `[timestamp] [LEVEL] [category] message` lines
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'warn' });
 * logger.warn('reference', 'Failed to download schema', error);
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? levelFromEnv();
  const write = options.write ?? ((line: string) => console.error(line));

  const enabled = (target: LogLevel): boolean => LEVEL_RANK[target] >= LEVEL_RANK[level];

  const emit = (target: Exclude<LogLevel, 'silent'>, category: LogCategory, message: string): void => {
    const timestamp = new Date().toISOString();
    write(`[${timestamp}] [${target.toUpperCase()}] [${category}] ${message}`);
  };

  const emitError = (error: Error | undefined): void => {
    if (!error) {
      return;
    }
    write(`Error: ${error.message}`);
    if (level === 'debug' && error.stack) {
      write(error.stack);
    }
  };

  return {
    level,
    debug(category, message, metadata) {
      if (!enabled('debug')) {
        return;
      }
      emit('debug', category, message);
      if (metadata) {
        write(JSON.stringify(metadata, null, 2));
      }
    },
    info(category, message) {
      if (enabled('info')) {
        emit('info', category, message);
      }
    },
    warn(category, message, error) {
      if (enabled('warn')) {
        emit('warn', category, message);
        emitError(error);
      }
    },
    error(category, message, error) {
      if (enabled('error')) {
        emit('error', category, message);
        emitError(error);
      }
    },
  };
}

/**
 * Logger that drops everything (library default when the caller passes none)
 */
export const silentLogger: Logger = createLogger({ level: 'silent' });
