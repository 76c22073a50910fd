import { describe, it, expect } from 'vitest';
import {
  createComponentLogger,
  createServerLogger,
  flushLogger,
  logger,
  toPinoLevel,
} from '../../src/utils/logger.js';
import { ConfigError } from '../../src/core/errors.js';

describe('Logger', () => {
  describe('createComponentLogger', () => {
    it('should create a child logger with logging methods', () => {
      const childLogger = createComponentLogger('config');
      expect(typeof childLogger.info).toBe('function');
      expect(typeof childLogger.debug).toBe('function');
      expect(typeof childLogger.fatal).toBe('function');
    });

    it('should bind the component name', () => {
      expect(createComponentLogger('cli').bindings()).toEqual({ component: 'cli' });
    });
  });

  describe('logger instance', () => {
    it('should have child method', () => {
      expect(typeof logger.child).toBe('function');
    });
  });

  describe('flushLogger', () => {
    it('should write out pending lines without throwing', () => {
      logger.info('pending line');
      expect(() => flushLogger()).not.toThrow();
    });
  });

  describe('toPinoLevel', () => {
    it('should map server level names to pino levels', () => {
      expect(toPinoLevel('debug')).toBe('debug');
      expect(toPinoLevel('info')).toBe('info');
      expect(toPinoLevel('warning')).toBe('warn');
      expect(toPinoLevel('error')).toBe('error');
      expect(toPinoLevel('critical')).toBe('fatal');
    });

    it('should ignore case', () => {
      expect(toPinoLevel('WARNING')).toBe('warn');
    });

    it('should reject unknown level names', () => {
      expect(() => toPinoLevel('verbose')).toThrow(ConfigError);
      expect(() => toPinoLevel('verbose')).toThrow("Invalid log level: 'verbose'");
    });
  });

  describe('createServerLogger', () => {
    it('should reject an invalid loglevel before opening a destination', () => {
      expect(() => createServerLogger({ loglevel: 'loud', logfile: '-' })).toThrow(
        "Invalid log level: 'loud'"
      );
    });

    it('should build a logger for stdout', () => {
      const serverLogger = createServerLogger({ loglevel: undefined, logfile: '-' });
      expect(typeof serverLogger.info).toBe('function');
    });
  });
});
