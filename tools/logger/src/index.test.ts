import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger, createConsoleLogger, silentLogger } from './index';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('delegates each level to the given methods', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods);

    logger.info('[Test] hello', 42);
    logger.error('[Test] boom');

    expect(methods.info).toHaveBeenCalledWith('[Test] hello', 42);
    expect(methods.error).toHaveBeenCalledWith('[Test] boom');
    expect(methods.debug).not.toHaveBeenCalled();
  });

  test('withMinimumLevel drops calls below the level', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods).withMinimumLevel('warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(methods.debug).not.toHaveBeenCalled();
    expect(methods.info).not.toHaveBeenCalled();
    expect(methods.warn).toHaveBeenCalledWith('w');
    expect(methods.error).toHaveBeenCalledWith('e');
  });

  test('silent level drops everything', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods).withMinimumLevel('silent');

    logger.error('e');

    expect(methods.error).not.toHaveBeenCalled();
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('writes info to console.info by default', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});

    createConsoleLogger().info('[Test] message');

    expect(spy).toHaveBeenCalledWith('[Test] message');
  });

  test('filters debug at the default level', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createConsoleLogger().debug('[Test] hidden');

    expect(spy).not.toHaveBeenCalled();
  });
});

describe('silentLogger', () => {
  test('accepts calls without output', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    silentLogger.error('nothing');

    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
