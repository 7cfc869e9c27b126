/**
 * Logger
 *
 * Minimal leveled logger. Messages carry a fixed prefix and go to the
 * console unless another sink is supplied.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/**
 * Destination for formatted log lines
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Highest level that is emitted (default: info) */
  level?: LogLevel;
  /** Prefix for every line (default: outcome-loop) */
  prefix?: string;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const prefix = options.prefix ?? 'outcome-loop';
  const sink = options.sink ?? consoleSink;

  const emit = (level: LogLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(level) > threshold) return;
    const tag = level === 'info' ? '' : ` ${level.toUpperCase()}:`;
    sink(level, `[${prefix}]${tag} ${message}`);
  };

  return {
    error: (msg) => emit('error', msg),
    warn: (msg) => emit('warn', msg),
    info: (msg) => emit('info', msg),
    debug: (msg) => emit('debug', msg),
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
