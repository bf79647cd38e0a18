import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
  })),
  setLogLevel: vi.fn(),
}));

import { ServiceContainer } from '../src/main/services/service-container';
import { setLogLevel } from '../src/main/services/logger';
import { BlockingClock, FakeClipboard } from './helpers/fakes';

function createContainer(): ServiceContainer {
  return new ServiceContainer({ dbPath: ':memory:', source: new FakeClipboard(), clock: new BlockingClock() });
}

beforeEach(() => {
  vi.mocked(setLogLevel).mockClear();
});

describe('ServiceContainer', () => {
  it('refuses lookups before init', () => {
    const container = createContainer();

    expect(() => container.get('clipboard')).toThrow('ServiceContainer not initialized — call init() first');
    expect(container.has('database')).toBe(false);
  });

  it('wires every service on init', async () => {
    const container = createContainer();
    await container.init();

    for (const key of ['database', 'config', 'history', 'search', 'monitor', 'clipboard'] as const) {
      expect(container.has(key)).toBe(true);
    }
    expect(container.get('database').isReady()).toBe(true);
    expect(container.get('clipboard').getStatus().monitor.running).toBe(true);
    expect(setLogLevel).toHaveBeenCalledWith('info');

    await container.shutdown();
  });

  it('refuses a second init', async () => {
    const container = createContainer();
    await container.init();

    await expect(container.init()).rejects.toThrow('ServiceContainer already initialized');
    await container.shutdown();
  });

  it('passes stored settings to the history store', async () => {
    const container = createContainer();
    await container.init();
    const config = container.get('config');

    config.set('maxHistoryItems', 5);

    expect(container.get('history').getOptions().maxHistoryItems).toBe(5);
    await container.shutdown();
  });

  it('follows log level changes', async () => {
    const container = createContainer();
    await container.init();

    container.get('config').set('logLevel', 'debug');

    expect(setLogLevel).toHaveBeenLastCalledWith('debug');
    await container.shutdown();
  });

  it('stops capture and closes storage on shutdown', async () => {
    const container = createContainer();
    await container.init();
    const monitor = container.get('monitor');
    const database = container.get('database');

    await container.shutdown();

    expect(monitor.isRunning()).toBe(false);
    expect(database.isReady()).toBe(false);
    expect(container.has('clipboard')).toBe(false);
    expect(() => container.get('clipboard')).toThrow('ServiceContainer not initialized — call init() first');
  });

  it('shuts down cleanly when never initialized', async () => {
    await expect(createContainer().shutdown()).resolves.toBeUndefined();
  });
});
