import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLogger, createChildLogger, getLogLevel, isValidLogLevel } from './logger';

describe('logger', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL_ENGINE;
    process.env.NODE_ENV = 'test';
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('getLogLevel', () => {
    it('should default by environment', () => {
      expect(getLogLevel('engine')).toBe('silent');
      process.env.NODE_ENV = 'production';
      expect(getLogLevel('engine')).toBe('info');
      process.env.NODE_ENV = 'development';
      expect(getLogLevel('engine')).toBe('debug');
    });

    it('should prefer the service level over the global level', () => {
      process.env.LOG_LEVEL = 'warn';
      expect(getLogLevel('engine')).toBe('warn');
      process.env.LOG_LEVEL_ENGINE = 'trace';
      expect(getLogLevel('engine')).toBe('trace');
      expect(getLogLevel('publisher')).toBe('warn');
    });

    it('should ignore invalid levels', () => {
      process.env.LOG_LEVEL = 'loud';
      expect(getLogLevel('engine')).toBe('silent');
    });
  });

  it('should validate level names', () => {
    expect(isValidLogLevel('fatal')).toBe(true);
    expect(isValidLogLevel('verbose')).toBe(false);
    expect(isValidLogLevel(undefined)).toBe(false);
  });

  it('should create loggers with explicit levels and bindings', () => {
    const logger = createLogger({ service: 'engine', level: 'info' });
    const child = createChildLogger(logger, { runId: 'run_1' });

    expect(logger.level).toBe('info');
    expect(child.level).toBe('info');
    expect(child.bindings()).toEqual({ service: 'engine', runId: 'run_1' });
  });
});
