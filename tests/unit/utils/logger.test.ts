import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createChildLogger, createLogger, isLogLevel, resetLogLevel, setLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
    resetLogLevel();
  });

  describe('createLogger', () => {
    it('should set the component name', () => {
      const logger = createLogger('my-component');
      expect(logger.bindings().name).toBe('my-component');
    });

    it('should default to info level', () => {
      delete process.env.LOG_LEVEL;
      expect(createLogger('test').level).toBe('info');
    });

    it('should respect explicit level parameter', () => {
      process.env.LOG_LEVEL = 'debug';
      expect(createLogger('test', 'error').level).toBe('error');
    });

    it('should respect LOG_LEVEL env var when no explicit level given', () => {
      process.env.LOG_LEVEL = 'DEBUG';
      expect(createLogger('test').level).toBe('debug');
    });

    it('should ignore invalid LOG_LEVEL values', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(createLogger('test').level).toBe('info');
    });
  });

  describe('isLogLevel', () => {
    it('should accept pino level names', () => {
      expect(isLogLevel('trace')).toBe(true);
      expect(isLogLevel('fatal')).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isLogLevel('silent')).toBe(false);
      expect(isLogLevel('INFO')).toBe(false);
    });
  });

  describe('setLogLevel', () => {
    it('should update loggers created earlier and later', () => {
      const before = createLogger('before', 'warn');
      setLogLevel('debug');
      const after = createLogger('after');

      expect(before.level).toBe('debug');
      expect(after.level).toBe('debug');
    });

    it('should leave the environment alone and take precedence over it', () => {
      delete process.env.LOG_LEVEL;
      setLogLevel('warn');
      process.env.LOG_LEVEL = 'error';

      expect(createLogger('later').level).toBe('warn');
      expect(process.env.LOG_LEVEL).toBe('error');
    });

    it('should let LOG_LEVEL apply again after a reset', () => {
      setLogLevel('warn');
      resetLogLevel();
      process.env.LOG_LEVEL = 'error';

      expect(createLogger('later').level).toBe('error');
    });
  });

  describe('createChildLogger', () => {
    it('should create a child logger with additional bindings', () => {
      const parent = createLogger('parent');
      const child = createChildLogger(parent, { session: 'abc' });

      expect(child.bindings().session).toBe('abc');
      expect(child.bindings().name).toBe('parent');
    });

    it('should inherit log level from parent', () => {
      const parent = createLogger('parent', 'debug');
      const child = createChildLogger(parent, { component: 'child' });

      expect(child.level).toBe('debug');
    });
  });
});
