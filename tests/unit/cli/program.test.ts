import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { createProgram } from '@/cli/program.js';
import { captureOutput, getLevel, getLogger, resetLogger } from '@/utils/logging/index.js';
import { resetEnvCache } from '@/utils/env.js';

const WARN = '\x1b[33mWARN \x1b[0m: ';

function run(...args: string[]): void {
  createProgram().exitOverride().parse(args, { from: 'user' });
}

describe('CLI program', () => {
  const originalEnv = process.env;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.LOG_FORMAT;
    delete process.env.LOG_LEVEL;
    resetEnvCache();
    resetLogger();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = originalEnv;
    process.exitCode = undefined;
    resetEnvCache();
    resetLogger();
    vi.restoreAllMocks();
  });

  describe('levels', () => {
    it('should print every level on its own line', () => {
      run('levels');

      expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
        'fatal',
        'error',
        'warn',
        'info',
        'debug',
        'trace',
      ]);
    });
  });

  describe('emit', () => {
    it('should log the joined message at the given level', () => {
      const output = captureOutput(() => run('emit', 'warn', 'disk', 'almost', 'full'));

      expect(output).toBe(`${WARN}disk almost full\n`);
    });

    it('should tag the message with the sub-command and clear it afterwards', () => {
      const output = captureOutput(() => {
        run('emit', '--sub-command', 'deploy', 'warn', 'rolling out');
        getLogger().warn('done');
      });

      expect(output).toBe(`${WARN}\x1b[34mDEPLOY\x1b[0m : rolling out\n${WARN}done\n`);
    });

    it('should apply the log level before emitting', () => {
      const output = captureOutput(() => run('emit', '-l', 'error', 'warn', 'filtered'));

      expect(output).toBe('');
      expect(getLevel()).toBe('error');
    });

    it('should report an unknown level and set a failing exit code', () => {
      const output = captureOutput(() => run('emit', 'loud', 'hello'));

      expect(output).toBe('');
      expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
      expect(consoleErrorSpy.mock.calls[0][0]).toContain("Invalid log level 'loud'");
      expect(consoleErrorSpy.mock.calls[1][0]).toContain(
        'Valid levels: fatal, error, warn, info, debug, trace'
      );
      expect(process.exitCode).toBe(1);
    });

    it('should reject an unknown --log-level', () => {
      run('emit', '--log-level', 'verbose', 'info', 'hello');

      expect(consoleErrorSpy.mock.calls[0][0]).toContain("Invalid log level 'verbose'");
      expect(process.exitCode).toBe(1);
      expect(getLevel()).toBe('info');
    });
  });
});
