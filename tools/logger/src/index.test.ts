import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger } from './index';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('delegates to the provided methods', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods);

    logger.info('hello', 1);
    logger.error('boom');

    expect(methods.info).toHaveBeenCalledWith('hello', 1);
    expect(methods.error).toHaveBeenCalledWith('boom');
    expect(methods.debug).not.toHaveBeenCalled();
  });

  test('console logger drops messages below its level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = Logger.console('info');
    logger.debug('hidden');
    logger.info('shown');
    logger.warn('also shown');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).toHaveBeenCalledWith('shown');
    expect(warnSpy).toHaveBeenCalledWith('also shown');
  });

  test('silent logger never writes to the console', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    Logger.silent().error('nothing');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
