/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

/**
 * Structured logger
 *
 * Emits one JSON object per line so index updates and queries can be
 * filtered by level, request id or context fields.
 */

import type { LogLevel } from '@pkgindex/shared';

export type { LogLevel };

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  requestId?: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
    name?: string;
    code?: string;
  };
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private logLevel: LogLevel;
  private requestId?: string;

  constructor(logLevel: LogLevel = 'info') {
    this.logLevel = logLevel;
  }

  /**
   * Set request ID for correlation across log entries
   */
  setRequestId(requestId: string | undefined): void {
    this.requestId = requestId;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    if (this.requestId) {
      entry.requestId = this.requestId;
    }

    if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }

    if (error) {
      entry.error = {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
      if ('code' in error && typeof error.code === 'string') {
        entry.error.code = error.code;
      }
    }

    return entry;
  }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const jsonString = JSON.stringify(this.createLogEntry(level, message, context, error));

    // stdout stays free for command output
    switch (level) {
      case 'debug':
      case 'info':
        console.error(jsonString);
        break;
      case 'warn':
        console.warn(jsonString);
        break;
      case 'error':
        console.error(jsonString);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.emit('error', message, context, error);
  }
}

let loggerInstance: Logger | null = null;

/**
 * Get logger instance
 * Creates a new instance if one doesn't exist
 */
export function getLogger(logLevel?: LogLevel): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(logLevel);
  }
  if (logLevel) {
    loggerInstance.setLevel(logLevel);
  }
  return loggerInstance;
}

/**
 * Create a new logger instance (useful for testing)
 */
export function createLogger(logLevel: LogLevel = 'info'): Logger {
  return new Logger(logLevel);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
