/**
 * Structured logging for conformance runs
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    console[consoleMethod(level)](formatLogLine(level, message, context, new Date()));
  }
}

/**
 * No-op logger for runs where logging is disabled
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }
}

/**
 * Formats a log line as `[timestamp] [LEVEL] message {context}`
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  context: LogContext | undefined,
  at: Date
): string {
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  return `[${at.toISOString()}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function consoleMethod(level: LogLevel): 'error' | 'warn' | 'debug' | 'log' {
  switch (level) {
    case 'error':
      return 'error';
    case 'warn':
      return 'warn';
    case 'debug':
    case 'trace':
      return 'debug';
    default:
      return 'log';
  }
}

/**
 * Creates the logger for a run: debug output when verbose, info otherwise
 */
export function createLogger(verbose: boolean): Logger {
  return new ConsoleLogger(verbose ? 'debug' : 'info');
}
