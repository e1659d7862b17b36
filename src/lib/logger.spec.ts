import { afterEach, describe, expect, it, vi } from 'vitest';

import { getLogLevel, isLogLevel, logger, setLogLevel } from './logger';

describe('logger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('drops messages below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('shown');
  });

  it('silent suppresses errors too', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('silent');

    logger.error('boom');

    expect(error).not.toHaveBeenCalled();
  });

  it('debug lets everything through', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('debug');

    logger.log('scan', 3);

    expect(log).toHaveBeenCalledWith('scan', 3);
  });

  it('recognises level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
