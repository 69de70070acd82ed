/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Level-based structured logging for the access layer.
 *
 * Every component takes a {@link Logger} so tests and embedding applications
 * can substitute their own; by default they share {@link logger}.
 *
 * @example
 * ```typescript
 * import { logger } from './utils/logger.js';
 *
 * const log = logger.child('rate-limiter');
 * log.warn('Auto-registering API', { api: 'places' });
 * ```
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  child(scope: string): Logger;
}

interface LoggerOptions {
  level: LogLevel;
  debugMode?: boolean;
  scope?: string;
}

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private debugMode: boolean;
  private readonly scope?: string;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.debugMode = options.debugMode ?? false;
    this.scope = options.scope;
  }

  /**
   * Set the minimum log level. Messages below this level will be suppressed.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Enable or disable debug mode. When enabled, debug logs are shown.
   */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
    if (enabled && this.level > LogLevel.DEBUG) {
      this.level = LogLevel.DEBUG;
    }
  }

  debug(message: string, data?: LogData): void {
    this.write(LogLevel.DEBUG, this.scope, message, data);
  }

  info(message: string, data?: LogData): void {
    this.write(LogLevel.INFO, this.scope, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write(LogLevel.WARN, this.scope, message, data);
  }

  error(message: string, data?: LogData): void {
    this.write(LogLevel.ERROR, this.scope, message, data);
  }

  /**
   * Create a logger that shares this one's level and prefixes a scope.
   */
  child(scope: string): Logger {
    const qualified = this.scope ? `${this.scope}:${scope}` : scope;
    return {
      debug: (message, data) => this.write(LogLevel.DEBUG, qualified, message, data),
      info: (message, data) => this.write(LogLevel.INFO, qualified, message, data),
      warn: (message, data) => this.write(LogLevel.WARN, qualified, message, data),
      error: (message, data) => this.write(LogLevel.ERROR, qualified, message, data),
      child: (nested) => this.child(`${scope}:${nested}`),
    };
  }

  private isEnabled(level: LogLevel): boolean {
    if (level === LogLevel.DEBUG) {
      return this.debugMode && this.level <= LogLevel.DEBUG;
    }
    return this.level <= level;
  }

  private write(
    level: LogLevel,
    scope: string | undefined,
    message: string,
    data?: LogData,
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = scope ? `[${scope}] ` : '';
    let output = `[${timestamp}] [${LogLevel[level]}] ${prefix}${message}`;

    if (data && Object.keys(data).length > 0) {
      output += ` ${safeStringify(data)}`;
    }

    // stdout is reserved for command output
    console.error(output);
  }
}

function safeStringify(data: LogData): string {
  try {
    return JSON.stringify(data);
  } catch {
    return '[unserializable log data]';
  }
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

export function createLogger(options: Partial<LoggerOptions> = {}): ConsoleLogger {
  return new ConsoleLogger({
    level: options.level ?? LogLevel.INFO,
    debugMode: options.debugMode,
    scope: options.scope,
  });
}

export const logger = createLogger({
  level: parseLogLevel(process.env['LOG_LEVEL']),
  debugMode:
    process.env['DEBUG'] === 'true' ||
    process.env['LOG_LEVEL']?.toUpperCase() === 'DEBUG' ||
    process.env['NODE_ENV'] === 'development',
});

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
