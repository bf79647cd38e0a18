import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, getLogLevel, parseLogLevel, setLogLevel } from '../src/main/services/logger';

beforeEach(() => {
  setLogLevel('info');
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes messages with a timestamp and the tag', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(Date.prototype, 'toISOString').mockReturnValue('2024-01-01T00:00:00.000Z');

    createLogger('HistoryStore').info('Evicted items', { count: 3 });

    expect(spy).toHaveBeenCalledWith('2024-01-01T00:00:00.000Z', '[HistoryStore]', 'Evicted items', { count: 3 });
  });

  it('drops messages below the global level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = createLogger('Monitor');

    setLogLevel('warn');
    log.debug('tick');
    log.info('started');
    log.warn('slow read');

    expect(getLogLevel()).toBe('warn');
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('applies level changes to loggers created earlier', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = createLogger('Monitor');

    log.debug('hidden');
    setLogLevel('debug');
    log.debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0]?.[2]).toBe('shown');
  });
});

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(parseLogLevel(' WARN ')).toBe('warn');
  });

  it('rejects anything else', () => {
    expect(parseLogLevel('verbose')).toBeNull();
    expect(parseLogLevel('')).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});
