import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, setLogLevel, getLogLevel, parseLogLevel, LogLevel } from '../src/logger.js';

describe('logger.ts', () => {
  let originalLevel: LogLevel;

  beforeEach(() => {
    originalLevel = getLogLevel();
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel(' warn ')).toBe(LogLevel.WARN);
    });

    it('should fall back for unknown or missing names', () => {
      expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
      expect(parseLogLevel('verbose', LogLevel.ERROR)).toBe(LogLevel.ERROR);
    });
  });

  describe('createLogger', () => {
    it('should prefix output with the context', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      setLogLevel(LogLevel.INFO);

      createLogger('IconLocator').info('Found favicon:', '/local/icons/favicon.ico');

      expect(spy).toHaveBeenCalledWith('[IconLocator]', 'Found favicon:', '/local/icons/favicon.ico');
    });

    it('should drop messages below the current level', () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      setLogLevel(LogLevel.WARN);

      const logger = createLogger('Test');
      logger.info('hidden');
      logger.debug('hidden');
      logger.warn('shown');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('[Test]', 'shown');
    });

    it('should tag debug output', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      setLogLevel(LogLevel.DEBUG);

      createLogger('Test').debug('details', { a: 1 });

      expect(spy).toHaveBeenCalledWith('[Test]', '[DEBUG]', 'details', { a: 1 });
    });
  });
});
