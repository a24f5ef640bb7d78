/**
 * Logger Factory
 *
 * Builds the root winston logger and caches one Logger wrapper per component.
 *
 * Usage:
 *   import { getLogger } from '../logging/index.js';
 *
 *   const logger = getLogger('x12-parser');
 *   logger.debug('Parsed X12 document');
 *
 * initializeLogging() is optional; getLogger() lazily initializes with the
 * environment-derived defaults.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider, setRootLoggerProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston ranks by priority: lower number means more severe.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

setGlobalLevelProvider(() => currentGlobalLevel);
setRootLoggerProvider(() => ensureInitialized());

/**
 * Initialize the logging subsystem. Safe to call again; loggers handed out
 * earlier write to the new root from then on.
 *
 * The root accepts every level. Filtering happens in Logger, against the
 * global level and any per-component override.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(
      new FileTransport(config.logFile, config.logFormat, config.timestampFormat).createWinstonTransport()
    );
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }
  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: toWinstonLevel(LogLevel.TRACE),
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  initFromEnv(config.debugComponents);

  return root;
}

function ensureInitialized(): winston.Logger {
  return rootLogger ?? initializeLogging();
}

/**
 * Get (or create) the Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  ensureInitialized();
  const logger = new Logger(component);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime. Components with an override keep it.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
}
