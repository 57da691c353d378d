import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getEnv, getLogFormat, resetEnvCache } from '@/utils/env.js';

describe('env', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.LOG_FORMAT;
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_TIMESTAMP;
    delete process.env.LOG_TIMEZONE;
    resetEnvCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetEnvCache();
  });

  describe('getEnv', () => {
    it('should apply defaults when nothing is set', () => {
      expect(getEnv()).toEqual({ LOG_FORMAT: 'text', LOG_LEVEL: 'info', LOG_TIMESTAMP: false });
    });

    it('should select json only for the exact value json', () => {
      process.env.LOG_FORMAT = 'json';
      expect(getEnv().LOG_FORMAT).toBe('json');

      resetEnvCache();
      process.env.LOG_FORMAT = 'Json';
      expect(getEnv().LOG_FORMAT).toBe('text');

      resetEnvCache();
      process.env.LOG_FORMAT = 'pretty';
      expect(getEnv().LOG_FORMAT).toBe('text');
    });

    it('should normalize LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'WARNING';

      expect(getEnv().LOG_LEVEL).toBe('warn');
    });

    it('should read LOG_TIMEZONE', () => {
      process.env.LOG_TIMEZONE = 'Europe/Berlin';

      expect(getEnv().LOG_TIMEZONE).toBe('Europe/Berlin');
    });

    it('should throw when LOG_LEVEL is not a level', () => {
      process.env.LOG_LEVEL = 'loud';

      expect(() => getEnv()).toThrow('Environment validation failed');
      expect(() => getEnv()).toThrow('LOG_LEVEL');
    });

    it('should read LOG_TIMESTAMP as a flag', () => {
      process.env.LOG_TIMESTAMP = 'TRUE';
      expect(getEnv().LOG_TIMESTAMP).toBe(true);

      resetEnvCache();
      process.env.LOG_TIMESTAMP = '0';
      expect(getEnv().LOG_TIMESTAMP).toBe(false);
    });

    it('should cache the parsed environment', () => {
      const first = getEnv();
      process.env.LOG_FORMAT = 'json';

      expect(getEnv()).toBe(first);
      expect(getEnv().LOG_FORMAT).toBe('text');
    });
  });

  describe('getLogFormat', () => {
    it('should read LOG_FORMAT even when LOG_LEVEL is invalid', () => {
      process.env.LOG_LEVEL = 'loud';
      process.env.LOG_FORMAT = 'json';

      expect(() => getEnv()).toThrow('LOG_LEVEL');
      expect(getLogFormat()).toBe('json');
    });

    it('should default to text', () => {
      expect(getLogFormat()).toBe('text');
    });
  });
});
