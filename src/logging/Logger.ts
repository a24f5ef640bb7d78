/**
 * Logger
 *
 * Thin wrapper around a winston logger bound to a component name.
 * Level filtering goes through DebugModeRegistry so a single component can be
 * turned up to DEBUG or TRACE without touching the global level.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Global level getter, injected by the factory to avoid a circular import */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/** Current root logger, injected by the factory */
let rootLoggerFn: (() => winston.Logger) | null = null;

/**
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

/**
 * @internal
 */
export function setRootLoggerProvider(fn: () => winston.Logger): void {
  rootLoggerFn = fn;
}

/**
 * A Logger built without a winston logger writes to whatever root the
 * factory holds at the time of each call, so it survives re-initialization.
 */
export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonLogger?: winston.Logger
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message with an optional Error object.
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  isTraceEnabled(): boolean {
    return shouldLog(this.component, LogLevel.TRACE, globalLevelFn());
  }

  /**
   * Create a child logger with a sub-component suffix.
   * e.g. logger.child('assembler') on "x12-parser" yields "x12-parser.assembler"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonLogger);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>
  ): void {
    const target = this.winstonLogger ?? rootLoggerFn?.();
    if (!target || !shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    target.log(winstonLevel, message, meta);
  }
}
