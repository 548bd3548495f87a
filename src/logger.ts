/**
 * Centralized logging system with multiple output levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  context?: string;
  minLevel?: LogLevel;
  maxLogs?: number;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  const candidate = (value ?? '').toLowerCase();
  return LEVELS.find(level => level === candidate) ?? 'info';
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs: number;
  private minLevel: LogLevel;
  private context?: string;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.minLevel = options.minLevel ?? parseLogLevel(process.env.LOG_LEVEL);
    this.maxLogs = options.maxLogs ?? 1000;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: context ?? this.context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: context ?? this.context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: context ?? this.context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      context: context ?? this.context
    });
  }

  success(message: string): void {
    console.log(`\x1b[32m✅ ${message}\x1b[0m`);
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : this.logs;
  }

  clear(): void {
    this.logs = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

// Singleton instance
export const logger = new Logger();

/**
 * Base class for every error the index raises
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public statusCode: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Normalize any thrown value into an AppError and log it
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 500);
    logger.error(error.message, error, context);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 500);
  logger.error(String(error), undefined, context);
  return appError;
}
