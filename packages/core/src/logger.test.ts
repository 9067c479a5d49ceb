import { afterEach, describe, it, expect, vi } from 'vitest';
import { LogLevel, Logger, getGlobalLogLevel, logLevelFromName, setGlobalLogLevel } from './logger';

const initialLevel = getGlobalLogLevel();

afterEach(() => {
  setGlobalLogLevel(initialLevel);
  vi.restoreAllMocks();
});

describe('Logger', () => {
  it('should prefix output with the module name', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger('Test');
    logger.setLevel(LogLevel.DEBUG);

    logger.debug('strides', [3, 1]);

    expect(log).toHaveBeenCalledWith('[Test]', 'strides', [3, 1]);
  });

  it('should drop messages below the effective level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger('Test');
    logger.setLevel(LogLevel.ERROR);

    logger.info('hidden');
    logger.error('shown');

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[Test]', 'shown');
  });

  it('should follow the global level without a local override', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger('Test');

    setGlobalLogLevel(LogLevel.NONE);
    logger.warn('hidden');
    expect(warn).not.toHaveBeenCalled();

    setGlobalLogLevel(LogLevel.WARN);
    logger.warn('shown');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should let the local level be cleared', () => {
    const logger = new Logger('Test');
    setGlobalLogLevel(LogLevel.ERROR);
    logger.setLevel(LogLevel.DEBUG);
    expect(logger.isEnabled(LogLevel.DEBUG)).toBe(true);

    logger.setLevel(undefined);
    expect(logger.isEnabled(LogLevel.DEBUG)).toBe(false);
  });
});

describe('logLevelFromName', () => {
  it('should map names to levels', () => {
    expect(logLevelFromName('none')).toBe(LogLevel.NONE);
    expect(logLevelFromName('info')).toBe(LogLevel.INFO);
    expect(logLevelFromName('debug')).toBe(LogLevel.DEBUG);
  });
});
