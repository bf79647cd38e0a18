/**
 * ConfigService — typed configuration stored in the history database.
 *
 * Features:
 * - Zod schema validation on load (invalid stored values → defaults)
 * - Partial recovery: individually valid fields survive a failed load
 * - Typed get<K>/set<K> with full TypeScript inference
 * - setBatch() for multiple key updates in a single write
 * - onChange<K>() subscriptions so services follow changes at runtime
 * - Config version tracking + ordered migrations (legacy snake_case keys)
 * - EventEmitter 'change' event for process-level wiring
 *
 * Values live in the `settings` table of the history database, one JSON value
 * per key. Writes go straight through; better-sqlite3 commits synchronously.
 *
 * @module main/services/config
 */

import { EventEmitter } from 'events';
import { createLogger } from './logger';
import type { DatabaseService } from './database-service';
import { ClipError, ErrorCode } from '@shared/types';
import { ClipkeepConfigSchema, CURRENT_CONFIG_VERSION, CONFIG_MIGRATIONS } from '@shared/schemas/config-schema';
import type { ClipkeepConfigParsed, ConfigKey } from '@shared/schemas/config-schema';

export type { ClipkeepConfig } from '@shared/types/config';

const log = createLogger('Config');

const CONFIG_KEYS: ConfigKey[] = ClipkeepConfigSchema.keyof().options;

// ─── Change listener types ───

type ChangeCallback<K extends ConfigKey> = (newVal: ClipkeepConfigParsed[K], oldVal: ClipkeepConfigParsed[K]) => void;

type AnyChangeCallback = (changes: Partial<ClipkeepConfigParsed>) => void;

type KeyListener = (changes: Partial<ClipkeepConfigParsed>, oldValues: Partial<ClipkeepConfigParsed>) => void;

function copyKey<K extends ConfigKey>(target: Partial<ClipkeepConfigParsed>, source: ClipkeepConfigParsed, key: K): void {
  target[key] = source[key];
}

// ─── ConfigService ───

export class ConfigService extends EventEmitter {
  private readonly db: DatabaseService;
  private config: ClipkeepConfigParsed;

  /** Per-key change listeners */
  private keyListeners = new Map<ConfigKey, Set<KeyListener>>();
  /** Listeners for any config change */
  private anyListeners = new Set<AnyChangeCallback>();

  constructor(db: DatabaseService) {
    super();
    this.db = db;
    this.config = this.loadConfig();
  }

  // ────────────── Load ──────────────

  private loadConfig(): ClipkeepConfigParsed {
    const stored = this.db.getSettings();
    const raw = this.migrateConfig(stored);

    const result = ClipkeepConfigSchema.safeParse(raw);
    let config: ClipkeepConfigParsed;
    if (result.success) {
      config = result.data;
    } else {
      log.warn('Config validation failed, applying defaults. Issues:', result.error.issues);
      // Partial recovery: keep the fields that validate on their own
      const recovered = ClipkeepConfigSchema.safeParse(this.pickValidFields(raw));
      config = recovered.success ? recovered.data : ClipkeepConfigSchema.parse({});
    }

    if (stored._version !== CURRENT_CONFIG_VERSION || !result.success) {
      this.db.setSettings(config);
    }
    return config;
  }

  /**
   * Pick fields from raw config that individually pass validation.
   * Used for partial recovery when overall validation fails.
   */
  private pickValidFields(raw: Record<string, unknown>): Record<string, unknown> {
    const recovered: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!(key in ClipkeepConfigSchema.shape)) continue;
      if (ClipkeepConfigSchema.safeParse({ [key]: value }).success) {
        recovered[key] = value;
      }
    }
    return recovered;
  }

  /**
   * Run ordered migrations on raw config data.
   */
  private migrateConfig(raw: Record<string, unknown>): Record<string, unknown> {
    let version = typeof raw._version === 'number' ? raw._version : 0;
    let migrated = { ...raw };

    while (version < CURRENT_CONFIG_VERSION) {
      const migration = CONFIG_MIGRATIONS[version];
      if (migration) {
        log.info(`Migrating config v${version} → v${version + 1}`);
        migrated = migration(migrated);
      }
      version++;
    }

    migrated._version = CURRENT_CONFIG_VERSION;
    return migrated;
  }

  // ────────────── Typed accessors ──────────────

  get<K extends ConfigKey>(key: K): ClipkeepConfigParsed[K] {
    return this.config[key];
  }

  /**
   * Set a single config value. Persists and notifies listeners.
   * Throws CONFIG_VALIDATION_ERROR when the value fails the schema.
   */
  set<K extends ConfigKey>(key: K, value: ClipkeepConfigParsed[K]): void {
    const update: Partial<ClipkeepConfigParsed> = {};
    update[key] = value;
    this.setBatch(update);
  }

  /**
   * Set multiple config values atomically. Single write, single change notification.
   */
  setBatch(updates: Partial<ClipkeepConfigParsed>): void {
    const result = ClipkeepConfigSchema.safeParse({ ...this.config, ...updates });
    if (!result.success) {
      throw new ClipError('Invalid configuration update', ErrorCode.CONFIG_VALIDATION_ERROR, {
        context: { issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
      });
    }

    const next = result.data;
    const changes: Partial<ClipkeepConfigParsed> = {};
    const oldValues: Partial<ClipkeepConfigParsed> = {};
    for (const key of CONFIG_KEYS) {
      if (next[key] !== this.config[key]) {
        copyKey(changes, next, key);
        copyKey(oldValues, this.config, key);
      }
    }

    if (Object.keys(changes).length === 0) return;

    this.db.setSettings(changes);
    this.config = next;
    this.notifyChange(changes, oldValues);
  }

  /**
   * Get a shallow copy of the full config.
   */
  getAll(): ClipkeepConfigParsed {
    return { ...this.config };
  }

  // ────────────── Reactive subscriptions ──────────────

  /**
   * Subscribe to changes of a specific config key.
   * Returns an unsubscribe function.
   *
   * @example
   * const unsub = config.onChange('pollIntervalMs', (ms) => monitor.setOptions({ pollIntervalMs: ms }));
   */
  onChange<K extends ConfigKey>(key: K, callback: ChangeCallback<K>): () => void {
    const listener: KeyListener = (changes, oldValues) => {
      const next = changes[key];
      const prev = oldValues[key];
      if (next !== undefined && prev !== undefined) callback(next, prev);
    };

    let listeners = this.keyListeners.get(key);
    if (!listeners) {
      listeners = new Set();
      this.keyListeners.set(key, listeners);
    }
    listeners.add(listener);
    return () => {
      this.keyListeners.get(key)?.delete(listener);
    };
  }

  /**
   * Subscribe to any config change. Callback receives the changed keys/values.
   * Returns an unsubscribe function.
   */
  onAnyChange(callback: AnyChangeCallback): () => void {
    this.anyListeners.add(callback);
    return () => {
      this.anyListeners.delete(callback);
    };
  }

  private notifyChange(changes: Partial<ClipkeepConfigParsed>, oldValues: Partial<ClipkeepConfigParsed>): void {
    for (const key of CONFIG_KEYS) {
      if (!(key in changes)) continue;
      for (const listener of this.keyListeners.get(key) ?? []) {
        try {
          listener(changes, oldValues);
        } catch (err) {
          log.error(`Config onChange listener error for key "${key}":`, err);
        }
      }
    }

    for (const cb of this.anyListeners) {
      try {
        cb(changes);
      } catch (err) {
        log.error('Config onAnyChange listener error:', err);
      }
    }

    this.emit('change', changes);
  }

  // ────────────── Shutdown ──────────────

  shutdown(): void {
    this.keyListeners.clear();
    this.anyListeners.clear();
    this.removeAllListeners();
  }
}
