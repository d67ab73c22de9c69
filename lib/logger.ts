/**
 * Centralized Logger Utility
 *
 * Provides context-aware, structured logging with support for:
 * - Multiple log levels (debug, info, warn, error)
 * - Configuration-driven level and format (LOG_LEVEL, STRUCTURED_LOGGING)
 * - Request-scoped contexts and child loggers
 * - JSON or human-readable output formats
 *
 * Core components only depend on {@link LogSink}; formatting stays here.
 *
 * @module lib/logger
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log level enumeration with priority values
 * Lower numbers = more verbose, higher numbers = less verbose
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Additional data for log entries
 */
export type LogData = Record<string, unknown>;

/**
 * Minimal logging surface the resolution pipeline writes to
 */
export interface LogSink {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

/**
 * Context metadata for logging
 */
export interface LogContext {
  requestId?: string;
  type?: 'http';
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: string;
  structured?: boolean;
  context?: LogContext;
}

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Logger class for structured, context-aware logging
 */
export class Logger implements LogSink {
  private readonly context: LogContext;
  private readonly levelName: LogLevel;
  private readonly level: number;
  private readonly structured: boolean;

  constructor(options: LoggerOptions = {}) {
    const configured = options.level?.toLowerCase() ?? 'info';
    this.levelName = isLogLevel(configured) ? configured : 'info';
    this.level = LOG_LEVELS[this.levelName];
    this.structured = options.structured ?? false;
    this.context = options.context ?? {};
  }

  /**
   * Create a request-scoped logger
   *
   * @param options - Level and format settings
   * @param requestId - Inbound x-request-id, or a fresh id when absent
   */
  static forRequest(options: LoggerOptions, requestId?: string): Logger {
    return new Logger({
      ...options,
      context: {
        requestId: requestId || randomUUID().slice(0, 8),
        type: 'http',
      },
    });
  }

  /**
   * Derive a logger that carries extra context fields
   */
  child(context: LogContext): Logger {
    return new Logger({
      level: this.levelName,
      structured: this.structured,
      context: { ...this.context, ...context },
    });
  }

  private _log(level: LogLevel, message: string, data: LogData = {}): void {
    if (LOG_LEVELS[level] < this.level) return;

    const write = level === 'debug' ? console.log : console[level];

    if (this.structured) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...this.context,
        ...data,
      };
      write(JSON.stringify(entry));
      return;
    }

    const ctx = this.context.requestId ? `[req:${this.context.requestId}] ` : '';
    const dataStr = Object.keys(data).length ? ` ${JSON.stringify(data)}` : '';
    write(`[${level.toUpperCase()}] ${ctx}${message}${dataStr}`);
  }

  debug(message: string, data?: LogData): void {
    this._log('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this._log('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this._log('warn', message, data);
  }

  /**
   * Log error message (least verbose, always logged)
   */
  error(message: string, data?: LogData): void {
    this._log('error', message, data);
  }
}

/**
 * Sink that drops everything, for callers that do not care about logs
 */
export const silentLogger: LogSink = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
