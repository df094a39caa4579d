import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { Logger } from '../logger';

describe('Logger', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  const originalEnv = { ...process.env };

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    delete process.env.LOG_LEVEL;
    delete process.env.LOG_FORMAT;
    delete process.env.VERBOSE;
    delete process.env.SILENT;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.env = { ...originalEnv };
  });

  describe('log levels', () => {
    it('should write info and above to stderr by default', () => {
      const logger = new Logger();

      logger.debug('debug message');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(3);
      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('info message'));
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should include debug output when verbose', () => {
      const logger = new Logger({ verbose: true });

      logger.debug('debug message');

      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('debug message'));
    });

    it('should let silent win over verbose and still print results', () => {
      const logger = new Logger({ silent: true, verbose: true });

      logger.error('error message');
      logger.raw('result');

      expect(consoleErrorSpy).not.toHaveBeenCalled();
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledWith('result');
    });

    it('should read the level from LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'ERROR';
      const logger = new Logger();

      logger.warn('warn message');
      logger.error('error message');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(logger.getOptions().level).toBe('error');
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'loud';
      const logger = new Logger({ level: 'warn' });

      expect(logger.getOptions().level).toBe('warn');
    });
  });

  describe('json format', () => {
    it('should emit one JSON entry with merged metadata', () => {
      const logger = new Logger({ format: 'json', metadata: { component: 'sync' } });

      logger.info('merged', { branch: 'feature' });

      const line = String(consoleErrorSpy.mock.calls[0]?.[0]);
      const entry: unknown = JSON.parse(line);
      expect(entry).toMatchObject({
        level: 'info',
        message: 'merged',
        metadata: { component: 'sync', branch: 'feature' },
      });
    });

    it('should serialize errors without a stack outside debug level', () => {
      const logger = new Logger({ format: 'json' });

      logger.error('failed', { error: new TypeError('boom') });

      const entry: unknown = JSON.parse(String(consoleErrorSpy.mock.calls[0]?.[0]));
      expect(entry).toMatchObject({
        metadata: { error: { name: 'TypeError', message: 'boom' } },
      });
      expect(JSON.stringify(entry)).not.toContain('"stack"');
    });
  });

  describe('configure and child', () => {
    it('should apply silent mode at runtime', () => {
      const logger = new Logger();

      logger.configure({ silent: true });
      logger.error('hidden');
      logger.raw('https://github.com/acme/widgets/pull/9');

      expect(consoleErrorSpy).not.toHaveBeenCalled();
      expect(consoleLogSpy).toHaveBeenCalledWith('https://github.com/acme/widgets/pull/9');
      expect(logger.getOptions().level).toBe('silent');
    });

    it('should carry parent metadata into child loggers', () => {
      const parent = new Logger({ format: 'json', metadata: { run: 1 } });
      const child = parent.child({ step: 'fetch' });

      child.info('step');

      const entry: unknown = JSON.parse(String(consoleErrorSpy.mock.calls[0]?.[0]));
      expect(entry).toMatchObject({ metadata: { run: 1, step: 'fetch' } });
    });

    it('should print raw results to stdout', () => {
      const logger = new Logger();

      logger.raw('https://example.test/pull/1');

      expect(consoleLogSpy).toHaveBeenCalledWith('https://example.test/pull/1');
    });
  });
});
