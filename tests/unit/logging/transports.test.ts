import { describe, it, expect } from '@jest/globals';
import winston from 'winston';
import { ConsoleTransport, FileTransport, formatLog4jTimestamp } from '../../../src/logging/transports.js';

describe('transports', () => {
  describe('formatLog4jTimestamp', () => {
    it('should format as yyyy-MM-dd HH:mm:ss,SSS', () => {
      expect(formatLog4jTimestamp(new Date(2026, 1, 10, 14, 30, 15, 42))).toBe('2026-02-10 14:30:15,042');
    });

    it('should zero-pad single digits', () => {
      expect(formatLog4jTimestamp(new Date(2026, 0, 2, 3, 4, 5, 6))).toBe('2026-01-02 03:04:05,006');
    });
  });

  describe('ConsoleTransport', () => {
    it('should create a winston console transport', () => {
      const transport = new ConsoleTransport('text', 'log4j');
      expect(transport.name).toBe('console');
      expect(transport.createWinstonTransport()).toBeInstanceOf(winston.transports.Console);
    });
  });

  describe('FileTransport', () => {
    it('should be named file', () => {
      expect(new FileTransport('/tmp/x12-transport-test.log', 'json').name).toBe('file');
    });
  });
});
