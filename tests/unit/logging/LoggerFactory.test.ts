import * as os from 'os';
import * as path from 'path';
import { Writable } from 'stream';
import winston from 'winston';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { resetDebugRegistry, setComponentLevel } from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import type { LogTransport } from '../../../src/logging/transports.js';
import { parseX12 } from '../../../src/x12/X12Parser.js';
import { PRODUCT_REGISTRATION_X12 } from '../../helpers/x12Fixtures.js';

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
  });

  afterEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
    process.env = { ...originalEnv };
  });

  describe('initializeLogging', () => {
    it('should initialize without errors', () => {
      expect(() => initializeLogging()).not.toThrow();
    });

    it('should attach additional transports', () => {
      const silent: LogTransport = {
        name: 'silent',
        createWinstonTransport: () => new winston.transports.Console({ silent: true }),
      };
      const root = initializeLogging([silent]);
      expect(root.transports).toHaveLength(2);
    });

    it('should respect LOG_LEVEL env var', () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      resetLoggingConfig();
      initializeLogging();
      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    });

    it('should re-initialize cleanly on repeated calls', () => {
      initializeLogging();
      initializeLogging();
      const logger = getLogger('test');
      expect(logger).toBeDefined();
    });
  });

  describe('getLogger', () => {
    it('should return a Logger instance', () => {
      initializeLogging();
      const logger = getLogger('test-component');
      expect(logger).toBeDefined();
      expect(logger.getComponent()).toBe('test-component');
    });

    it('should cache Logger instances by component', () => {
      initializeLogging();
      const logger1 = getLogger('component-a');
      const logger2 = getLogger('component-a');
      expect(logger1).toBe(logger2);
    });

    it('should return different Loggers for different components', () => {
      initializeLogging();
      const logger1 = getLogger('component-a');
      const logger2 = getLogger('component-b');
      expect(logger1).not.toBe(logger2);
    });

    it('should lazy-initialize if called before initializeLogging', () => {
      // Do NOT call initializeLogging first
      const logger = getLogger('lazy-component');
      expect(logger).toBeDefined();
      expect(logger.getComponent()).toBe('lazy-component');
    });

    it('should keep cached loggers across re-initialization', () => {
      initializeLogging();
      const loggerBefore = getLogger('rewire-test');

      initializeLogging();
      expect(getLogger('rewire-test')).toBe(loggerBefore);
    });
  });

  describe('setGlobalLevel / getGlobalLevel', () => {
    it('should default to INFO', () => {
      initializeLogging();
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });

    it('should update global level at runtime', () => {
      initializeLogging();
      setGlobalLevel(LogLevel.DEBUG);
      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    });

    it('should affect Logger level filtering', () => {
      initializeLogging();
      const logger = getLogger('runtime-level-test');

      // At INFO, debug should be filtered
      setGlobalLevel(LogLevel.INFO);
      expect(logger.isDebugEnabled()).toBe(false);

      // At DEBUG, debug should pass
      setGlobalLevel(LogLevel.DEBUG);
      expect(logger.isDebugEnabled()).toBe(true);
    });

    it('should accept all LogLevel values', () => {
      initializeLogging();
      for (const level of [LogLevel.TRACE, LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR]) {
        setGlobalLevel(level);
        expect(getGlobalLevel()).toBe(level);
      }
    });
  });

  describe('resetLogging', () => {
    it('should clear cached loggers', () => {
      initializeLogging();
      const before = getLogger('reset-test');
      resetLogging();
      initializeLogging();
      const after = getLogger('reset-test');
      expect(before).not.toBe(after);
    });

    it('should reset global level to INFO', () => {
      initializeLogging();
      setGlobalLevel(LogLevel.TRACE);
      resetLogging();
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });
  });

  describe('environment integration', () => {
    it('should initialize debug components from X12_DEBUG_COMPONENTS', () => {
      process.env['X12_DEBUG_COMPONENTS'] = 'x12-parser:TRACE';
      resetLoggingConfig();
      initializeLogging();

      const logger = getLogger('x12-parser');
      expect(logger.isTraceEnabled()).toBe(true);
    });

    it('should create file transport when LOG_FILE is set', () => {
      process.env['LOG_FILE'] = path.join(os.tmpdir(), 'x12-logging-test.log');
      resetLoggingConfig();
      const root = initializeLogging();
      expect(root.transports).toHaveLength(2);
    });
  });

  describe('delivery to transports', () => {
    function captureTransport(): { transport: LogTransport; messages: string[] } {
      const messages: string[] = [];
      const stream = new Writable({
        objectMode: true,
        write(info: unknown, _encoding, callback) {
          if (typeof info === 'object' && info !== null && 'message' in info) {
            messages.push(String(info.message));
          }
          callback();
        },
      });
      return {
        transport: { name: 'capture', createWinstonTransport: () => new winston.transports.Stream({ stream }) },
        messages,
      };
    }

    function flush(): Promise<void> {
      return new Promise((resolve) => setTimeout(resolve, 20));
    }

    it('should reach loggers obtained before re-initialization', async () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      resetLoggingConfig();
      const early = getLogger('early-component');

      const capture = captureTransport();
      initializeLogging([capture.transport]);
      early.debug('after re-init');
      parseX12(PRODUCT_REGISTRATION_X12);
      await flush();

      expect(capture.messages).toContain('after re-init');
      expect(capture.messages.some((m) => m.startsWith('Parsed X12 document'))).toBe(true);
    });

    it('should deliver debug output for a component override at INFO', async () => {
      delete process.env['LOG_LEVEL'];
      resetLoggingConfig();
      const capture = captureTransport();
      initializeLogging([capture.transport]);
      setComponentLevel('x12-parser', LogLevel.DEBUG);

      getLogger('other-component').debug('filtered');
      parseX12(PRODUCT_REGISTRATION_X12);
      await flush();

      expect(capture.messages).not.toContain('filtered');
      expect(capture.messages.some((m) => m.startsWith('Parsed X12 document'))).toBe(true);
    });
  });
});
