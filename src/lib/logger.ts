/**
 * Logger
 * Leveled console logging with a scope prefix and JSON payloads
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log level severity ordering
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Logger with the same sink and a nested scope */
  child(scope: string): Logger;
}

/**
 * Parses log level string to enum value
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Errors do not serialize with JSON.stringify, so flatten them first
 */
function serializeValue(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatLogLine(
  timestamp: string,
  level: string,
  scope: string | undefined,
  message: string,
  data?: Record<string, unknown>
): string {
  const prefix = scope !== undefined ? `[${scope}] ` : '';
  const base = `[${timestamp}] [${level}] ${prefix}${message}`;
  if (data === undefined) {
    return base;
  }
  return `${base} ${JSON.stringify(data, serializeValue)}`;
}

export interface ConsoleLoggerOptions {
  level?: LogLevelName | LogLevel;
  scope?: string;
  clock?: () => Date;
}

/**
 * Create a logger writing to the console
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const level =
    typeof options.level === 'string'
      ? parseLogLevel(options.level)
      : (options.level ?? LogLevel.INFO);
  const clock = options.clock ?? (() => new Date());

  function write(
    severity: LogLevel,
    label: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (severity < level) {
      return;
    }
    const line = formatLogLine(
      clock().toISOString(),
      label,
      options.scope,
      message,
      data
    );
    if (severity >= LogLevel.ERROR) {
      console.error(line);
    } else if (severity === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug: (message, data) => write(LogLevel.DEBUG, 'DEBUG', message, data),
    info: (message, data) => write(LogLevel.INFO, 'INFO', message, data),
    warn: (message, data) => write(LogLevel.WARN, 'WARN', message, data),
    error: (message, data) => write(LogLevel.ERROR, 'ERROR', message, data),
    child(scope: string): Logger {
      const nested =
        options.scope !== undefined ? `${options.scope}:${scope}` : scope;
      return createConsoleLogger({ ...options, level, scope: nested });
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
