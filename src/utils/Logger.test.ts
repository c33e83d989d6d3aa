import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from './Logger';

describe('Logger', () => {
  let debugSpy: MockInstance;
  let infoSpy: MockInstance;
  let warnSpy: MockInstance;
  let errorSpy: MockInstance;

  beforeEach(() => {
    Logger.setLevel(LogLevel.DEBUG);
    Logger.setSink(null);
    debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    Logger.setLevel(LogLevel.DEBUG);
    Logger.setSink(null);
    vi.restoreAllMocks();
  });

  it('LOG-001: prefixes messages with the module name', () => {
    new Logger('RangeMerger').info('merged', 3);
    expect(infoSpy).toHaveBeenCalledWith('[RangeMerger]', 'merged', 3);
  });

  it('LOG-002: routes each level to the matching console method', () => {
    const logger = new Logger('Report');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(debugSpy).toHaveBeenCalledWith('[Report]', 'd');
    expect(infoSpy).toHaveBeenCalledWith('[Report]', 'i');
    expect(warnSpy).toHaveBeenCalledWith('[Report]', 'w');
    expect(errorSpy).toHaveBeenCalledWith('[Report]', 'e');
  });

  describe('level filtering', () => {
    it('LOG-003: suppresses debug and info at WARN', () => {
      Logger.setLevel(LogLevel.WARN);
      const logger = new Logger('Probe');
      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('visible');
      expect(debugSpy).not.toHaveBeenCalled();
      expect(infoSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('[Probe]', 'visible');
    });

    it('LOG-004: always emits errors', () => {
      Logger.setLevel(LogLevel.ERROR);
      const logger = new Logger('Probe');
      logger.warn('hidden');
      logger.error('visible');
      expect(warnSpy).not.toHaveBeenCalled();
      expect(errorSpy).toHaveBeenCalledWith('[Probe]', 'visible');
    });

    it('LOG-005: INFO suppresses debug but keeps info', () => {
      Logger.setLevel(LogLevel.INFO);
      const logger = new Logger('Ingest');
      logger.debug('hidden');
      logger.info('visible');
      expect(debugSpy).not.toHaveBeenCalled();
      expect(infoSpy).toHaveBeenCalledWith('[Ingest]', 'visible');
    });
  });

  describe('custom sink', () => {
    it('LOG-006: redirects output and passes the level', () => {
      const sink = vi.fn();
      Logger.setSink(sink);
      new Logger('Store').warn('corrupt', 'store.json');
      expect(sink).toHaveBeenCalledWith(LogLevel.WARN, '[Store]', 'corrupt', 'store.json');
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('LOG-007: null restores the console sink', () => {
      const sink = vi.fn();
      Logger.setSink(sink);
      Logger.setSink(null);
      new Logger('CLI').info('done');
      expect(sink).not.toHaveBeenCalled();
      expect(infoSpy).toHaveBeenCalledWith('[CLI]', 'done');
    });
  });

  describe('parseLogLevel', () => {
    it('LOG-008: accepts level names in any case', () => {
      expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel(' WARN ')).toBe(LogLevel.WARN);
      expect(parseLogLevel('Error')).toBe(LogLevel.ERROR);
    });

    it('LOG-009: returns null for unknown or missing names', () => {
      expect(parseLogLevel('verbose')).toBeNull();
      expect(parseLogLevel(undefined)).toBeNull();
      expect(parseLogLevel('')).toBeNull();
    });
  });
});
