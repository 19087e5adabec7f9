/** Log levels in increasing order of severity. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured payload attached to a log entry. */
export type LogContext = Record<string, unknown>;

/** One emitted log record as delivered to listeners. */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/** Callback notified for every entry, regardless of console level. */
export type LogListener = (entry: LogEntry) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/**
 * Process-wide logger with subscribable entries and a console sink.
 * Listeners see everything; the console only prints at or above `level`.
 */
export class LoggerService {
  private listeners: LogListener[] = [];
  private consoleLevel: LogLevel | 'silent' = 'info';

  public subscribe(listener: LogListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  public setLevel(level: LogLevel | 'silent'): void {
    this.consoleLevel = level;
  }

  public get level(): LogLevel | 'silent' {
    return this.consoleLevel;
  }

  public debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    const entry: LogEntry = context
      ? { timestamp: Date.now(), level, message, context }
      : { timestamp: Date.now(), level, message };

    if (this.consoleLevel !== 'silent' && LEVEL_RANK[level] >= LEVEL_RANK[this.consoleLevel]) {
      console[level](`[${level.toUpperCase()}] ${message}`, context ?? '');
    }

    this.listeners.forEach((l) => l(entry));
  }
}

export const Logger = new LoggerService();

/** Parse a configured level name, falling back to `info`. */
export function parseLogLevel(value: string | undefined): LogLevel | 'silent' {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }

  if (normalized === 'silent') {
    return 'silent';
  }

  return isLogLevel(normalized) ? normalized : 'info';
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}
