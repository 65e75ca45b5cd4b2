import { afterEach, describe, expect, it, vi } from 'vitest';

import { createConsoleLogger, errorContext, isLogLevel, silentLogger } from '../src/logging/logger.js';

describe('Logger', () => {
  const originalLevel = process.env.ARBOR_LOG_LEVEL;

  afterEach(() => {
    if (originalLevel === undefined) delete process.env.ARBOR_LOG_LEVEL;
    else process.env.ARBOR_LOG_LEVEL = originalLevel;
  });

  it('prefixes lines and passes the context through', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = createConsoleLogger({ prefix: 'Billing', level: 'info' });

    logger.info('Refreshing container', { definitions: 12 });
    logger.info('Done');

    expect(info).toHaveBeenNthCalledWith(1, '[Billing] Refreshing container', { definitions: 12 });
    expect(info).toHaveBeenNthCalledWith(2, '[Billing] Done');
  });

  it('drops levels below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger({ level: 'warn' });

    logger.trace('t');
    logger.debug('d');
    logger.warn('w');
    logger.error('e');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Arbor] w');
    expect(error).toHaveBeenCalledWith('[Arbor] e');
  });

  it('reads the level from ARBOR_LOG_LEVEL', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    process.env.ARBOR_LOG_LEVEL = 'trace';

    createConsoleLogger().trace('deep');

    expect(debug).toHaveBeenCalledWith('[Arbor] deep');
  });

  it('ignores an unknown ARBOR_LOG_LEVEL', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    process.env.ARBOR_LOG_LEVEL = 'loud';

    createConsoleLogger().info('hidden');

    expect(info).not.toHaveBeenCalled();
  });

  it('silences everything at level silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createConsoleLogger({ level: 'silent' }).error('nope');
    silentLogger.error('nope');

    expect(error).not.toHaveBeenCalled();
  });

  it('normalizes thrown values', () => {
    expect(errorContext(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
    expect(errorContext('text')).toEqual({ error: 'text' });
  });

  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
