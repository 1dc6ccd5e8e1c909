/**
 * Logger - Level-filtered logging for clients, drivers and graphs
 *
 * Every log message is stored in memory regardless of level, so a caller can
 * dump the history of a failed call even when console output was quiet.
 * Console output is filtered by the configured level.
 *
 * Each Client owns its own Logger; `logger` is the shared default used by
 * code that runs without a client.
 */

import { BUFFER_SIZES } from '@config/constants.js';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  VERBOSE = 3,
  DEBUG = 4,
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
}

export interface LoggerOptions {
  /** Minimum level written to the console (default INFO) */
  level?: LogLevel;
  /** Tag prepended to console output, e.g. "turnkit" */
  scope?: string;
  /** Maximum entries kept in the buffer */
  maxBufferSize?: number;
}

/**
 * Parse a level name ("debug", "WARN", ...) into a LogLevel
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'VERBOSE':
      return LogLevel.VERBOSE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

export class Logger {
  private logLevel: LogLevel;
  private readonly scope?: string;
  private logBuffer: LogEntry[] = [];
  private readonly maxBufferSize: number;

  constructor(options: LoggerOptions = {}) {
    this.logLevel = options.level ?? LogLevel.INFO;
    this.scope = options.scope;
    this.maxBufferSize = options.maxBufferSize ?? BUFFER_SIZES.MAX_LOG_BUFFER_SIZE;
  }

  /**
   * Set the log level
   */
  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Configure logging from CLI flags
   */
  configure(options: { verbose?: boolean; debug?: boolean }): void {
    if (options.debug) {
      this.logLevel = LogLevel.DEBUG;
    } else if (options.verbose) {
      this.logLevel = LogLevel.VERBOSE;
    }
  }

  /**
   * Store a log entry in the buffer
   * Serializes immediately so no references to caller objects are kept
   */
  private storeLog(level: LogLevel, args: unknown[]): void {
    let message = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      if (typeof arg === 'object' && arg !== null) {
        try {
          return JSON.stringify(arg);
        } catch {
          return '[Circular]';
        }
      }
      return String(arg);
    }).join(' ');

    if (message.length > BUFFER_SIZES.MAX_LOG_MESSAGE_LENGTH) {
      message = message.substring(0, BUFFER_SIZES.MAX_LOG_MESSAGE_LENGTH) + '... [truncated]';
    }

    this.logBuffer.push({
      timestamp: Date.now(),
      level,
      message,
    });

    if (this.logBuffer.length > this.maxBufferSize) {
      this.logBuffer.shift();
    }
  }

  private withScope(args: unknown[]): unknown[] {
    return this.scope ? [`[${this.scope}]`, ...args] : args;
  }

  /**
   * Log an error (always shown)
   */
  error(...args: unknown[]): void {
    this.storeLog(LogLevel.ERROR, args);
    if (this.logLevel >= LogLevel.ERROR) {
      console.error(...this.withScope(args));
    }
  }

  /**
   * Log a warning (shown at WARN level and above)
   */
  warn(...args: unknown[]): void {
    this.storeLog(LogLevel.WARN, args);
    if (this.logLevel >= LogLevel.WARN) {
      console.warn(...this.withScope(args));
    }
  }

  info(...args: unknown[]): void {
    this.storeLog(LogLevel.INFO, args);
    if (this.logLevel >= LogLevel.INFO) {
      console.log(...this.withScope(args));
    }
  }

  verbose(...args: unknown[]): void {
    this.storeLog(LogLevel.VERBOSE, args);
    if (this.logLevel >= LogLevel.VERBOSE) {
      console.log(...this.withScope(args));
    }
  }

  /**
   * Log debug info (shown only at DEBUG level)
   */
  debug(...args: unknown[]): void {
    this.storeLog(LogLevel.DEBUG, args);
    if (this.logLevel >= LogLevel.DEBUG) {
      console.log(...this.withScope(args));
    }
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  isDebugEnabled(): boolean {
    return this.logLevel >= LogLevel.DEBUG;
  }

  /**
   * Get all stored log entries
   */
  getAllLogs(): LogEntry[] {
    return [...this.logBuffer];
  }

  /**
   * Get logs filtered by level
   */
  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logBuffer.filter(entry => entry.level === level);
  }

  clearLogs(): void {
    this.logBuffer = [];
  }

  getLogCount(): number {
    return this.logBuffer.length;
  }
}

// Shared default instance
export const logger = new Logger();
