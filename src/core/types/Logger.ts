/**
 * Structured context attached to a log line
 */
export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for flexible logging integration
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

/**
 * Silent logger implementation (no-op)
 */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: Error, _context?: LogContext): void {}
}

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Console logger implementation
 *
 * Lines look like `[INFO] [RpcServer] RpcServer started {"address":"sum"}`.
 * The scope segment is omitted when no scope is given.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private scope?: string;

  constructor(minLevel: LogLevel = 'info', scope?: string) {
    this.minLevel = minLevel;
    this.scope = scope;
  }

  /**
   * Derive a logger that prefixes every line with `scope`
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.minLevel, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const scope = this.scope ? ` [${this.scope}]` : '';
    const ctx = context ? ` ${JSON.stringify(context)}` : '';
    return `[${level.toUpperCase()}]${scope} ${message}${ctx}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, error?: Error, context?: LogContext): void {
    if (this.shouldLog('error')) {
      const errorInfo = error ? ` - ${error.message}` : '';
      console.error(this.format('error', `${message}${errorInfo}`, context));
      if (error?.stack) {
        console.error(error.stack);
      }
    }
  }
}

/**
 * Parse a log level name, falling back to `fallback` for unknown values
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return fallback;
  }
}

/**
 * Build a console logger whose level comes from `RELAYKIT_LOG_LEVEL`
 */
export function createLoggerFromEnv(
  scope?: string,
  env: NodeJS.ProcessEnv = process.env
): ConsoleLogger {
  return new ConsoleLogger(parseLogLevel(env.RELAYKIT_LOG_LEVEL), scope);
}

/**
 * Scope a logger when it supports scoping; other loggers are returned as-is
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  return logger instanceof ConsoleLogger ? logger.child(scope) : logger;
}
