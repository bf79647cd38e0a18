/**
 * ServiceContainer — lightweight DI container for the clipboard history services.
 *
 * Provides typed access, centralized init, and ordered graceful shutdown.
 *
 * Usage:
 *   const container = new ServiceContainer();
 *   await container.init();
 *   const clipboard = container.get('clipboard');
 *   ...
 *   await container.shutdown();
 */

import { createLogger, setLogLevel } from './logger';
import { ConfigService } from './config';
import { DatabaseService, defaultDatabasePath } from './database-service';
import { HistoryStore } from './history-store';
import { SearchIndex } from './search-index';
import { ClipboardMonitor, type ClipboardSource, type MonitorClock } from './clipboard-monitor';
import { SystemClipboardSource } from './system-clipboard';
import { ClipboardService } from './clipboard-service';

const log = createLogger('Container');

// ─── Service Map: typed registry of all services ───

export interface ServiceMap {
  database: DatabaseService;
  config: ConfigService;
  history: HistoryStore;
  search: SearchIndex;
  monitor: ClipboardMonitor;
  clipboard: ClipboardService;
}

export type ServiceKey = keyof ServiceMap;

export interface ContainerOptions {
  /** SQLite file, or ':memory:' */
  dbPath?: string;
  /** Clipboard reader; defaults to the platform tools */
  source?: ClipboardSource;
  clock?: MonitorClock;
}

export class ServiceContainer {
  private services: Partial<ServiceMap> = {};
  private initialized = false;
  private readonly options: ContainerOptions;

  constructor(options: ContainerOptions = {}) {
    this.options = options;
  }

  /**
   * Get a registered service by key (typed).
   * Throws if the container hasn't been initialized yet or service doesn't exist.
   */
  get<K extends ServiceKey>(key: K): ServiceMap[K] {
    if (!this.initialized) {
      throw new Error(`ServiceContainer not initialized — call init() first`);
    }
    const svc = this.services[key];
    if (!svc) {
      throw new Error(`Service '${key}' not found in container`);
    }
    return svc;
  }

  has(key: ServiceKey): boolean {
    return this.services[key] !== undefined;
  }

  /**
   * Initialize all services in dependency order.
   */
  async init(): Promise<void> {
    if (this.initialized) {
      throw new Error('ServiceContainer already initialized');
    }

    log.info('Initializing services...');
    const t0 = Date.now();

    // ── Phase 1: Storage ──
    const database = new DatabaseService(this.options.dbPath ?? defaultDatabasePath());
    database.initialize();
    this.set('database', database);

    // ── Phase 2: Config (lives in the settings table) ──
    const config = new ConfigService(database);
    this.set('config', config);
    setLogLevel(config.get('logLevel'));
    config.onChange('logLevel', (level) => setLogLevel(level));

    // ── Phase 3: History core ──
    const settings = config.getAll();
    const history = new HistoryStore(database, {
      maxHistoryItems: settings.maxHistoryItems,
      autoCleanupEnabled: settings.autoCleanupEnabled,
      previewLength: settings.previewLength,
    });
    const search = new SearchIndex(history, settings.searchDebounceMs);
    const source = this.options.source ?? new SystemClipboardSource({ timeoutMs: settings.readTimeoutMs });
    const monitor = new ClipboardMonitor(
      source,
      history,
      {
        pollIntervalMs: settings.pollIntervalMs,
        readTimeoutMs: settings.readTimeoutMs,
        captureOnStart: settings.captureOnStart,
        previewLength: settings.previewLength,
        maxContentLength: settings.maxContentLength,
      },
      this.options.clock,
    );
    this.set('history', history);
    this.set('search', search);
    this.set('monitor', monitor);

    // ── Phase 4: Facade ──
    const clipboard = new ClipboardService({ store: history, search, config, monitor });
    this.set('clipboard', clipboard);

    this.initialized = true;
    clipboard.initialize();

    log.info(`All services initialized in ${Date.now() - t0}ms`);
  }

  /**
   * Graceful shutdown: stops services in reverse dependency order.
   * Also releases whatever a failed init() managed to open.
   */
  async shutdown(): Promise<void> {
    const t0 = Date.now();
    log.info('Graceful shutdown started');

    // Phase 1: Stop capture, apply clear-on-exit
    await this.tryAsync('clipboard', (s) => s.shutdown());

    // Phase 2: Listeners
    this.trySync('config', (s) => s.shutdown());

    // Phase 3: Storage (last)
    this.trySync('database', (s) => s.close());

    this.services = {};
    this.initialized = false;
    log.info(`Graceful shutdown completed in ${Date.now() - t0}ms`);
  }

  // ─── Private ───

  private set<K extends ServiceKey>(key: K, service: ServiceMap[K]): void {
    this.services[key] = service;
  }

  /** Safely call a sync method on a service, logging errors. */
  private trySync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => void): void {
    const service = this.services[key];
    if (!service) return;
    try {
      fn(service);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }

  /** Safely call an async method on a service, logging errors. */
  private async tryAsync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => Promise<void>): Promise<void> {
    const service = this.services[key];
    if (!service) return;
    try {
      await fn(service);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }
}
