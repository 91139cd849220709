/**
 * Logger interface for flexible logging integration
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Silent logger implementation (no-op)
 */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _error?: Error, _context?: Record<string, unknown>): void {}
}

/**
 * Renders a validated value for a log line. Objects are summarized by
 * constructor name so that cyclic inputs never reach JSON.stringify.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  if (Array.isArray(value)) return `Array(${value.length})`;
  if (value instanceof Map) return `Map(${value.size})`;
  if (typeof value === 'object') {
    const name = value.constructor?.name;
    return name && name !== 'Object' ? `[${name}]` : '[object]';
  }
  return String(value);
}

/**
 * Console logger implementation
 *
 * Lines look like `[DEBUG] kova: constraint violated {"constraintId":"kova.number.min"}`.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private prefix: string;

  constructor(minLevel: LogLevel = 'info', prefix: string = 'kova') {
    this.minLevel = minLevel;
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const head = `[${level.toUpperCase()}] ${this.prefix ? `${this.prefix}: ` : ''}${message}`;
    if (!context) return head;
    const flat: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(context)) {
      flat[key] =
        typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string' ? value : describeValue(value);
    }
    return `${head} ${JSON.stringify(flat)}`;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      const errorInfo = error ? ` - ${error.message}` : '';
      console.error(this.format('error', `${message}${errorInfo}`, context));
      if (error?.stack) {
        console.error(error.stack);
      }
    }
  }
}
