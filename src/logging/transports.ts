/**
 * Logging Transports
 *
 * Winston transport wrappers. The text layout follows the Log4j pattern
 * used by most integration engines:
 *   DEBUG 2026-02-10 14:30:15,042 [x12-parser] Parsed X12 document
 */

import winston from 'winston';
import type { LogFormat, TimestampFormat } from './config.js';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * Format a Date as yyyy-MM-dd HH:mm:ss,SSS in local time.
 */
export function formatLog4jTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const level = info.level.toUpperCase().padStart(5);
    const component = info['component'];
    const timestamp =
      timestampFormat === 'iso' ? new Date().toISOString() : formatLog4jTimestamp(new Date());
    const componentPart = typeof component === 'string' ? ` [${component}]` : '';
    const errorStack = info['errorStack'];
    let line = `${level} ${timestamp}${componentPart} ${String(info.message)}`;
    if (typeof errorStack === 'string') {
      line += '\n' + errorStack;
    }
    return line;
  });
}

function buildFormat(format: LogFormat, timestampFormat: TimestampFormat): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }
  return buildTextFormat(timestampFormat);
}

/**
 * Console transport. Every level goes to stdout.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: LogFormat,
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format, this.timestampFormat),
      stderrLevels: [],
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat,
    private timestampFormat: TimestampFormat = 'log4j'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format, this.timestampFormat),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    });
  }
}
