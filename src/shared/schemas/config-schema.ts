/**
 * Zod schema for clipkeep configuration.
 *
 * Single source of truth for config shape, defaults, and validation.
 * The ClipkeepConfig type is derived from this schema via z.infer<>.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// ─── Main config schema ───

export const ClipkeepConfigSchema = z.object({
  /** Schema version for migrations */
  _version: z.number().default(2),

  // ── History ──
  maxHistoryItems: z.number().int().positive().default(1000),
  autoCleanupEnabled: z.boolean().default(true),
  /** Delete unpinned items unused for N days at startup (0 = never) */
  retentionDays: z.number().int().min(0).default(0),
  clearOnExit: z.boolean().default(false),

  // ── Monitoring ──
  monitorEnabled: z.boolean().default(true),
  pollIntervalMs: z.number().int().min(50).default(500),
  readTimeoutMs: z.number().int().positive().default(1000),
  /** Record whatever is on the clipboard when monitoring starts */
  captureOnStart: z.boolean().default(false),
  maxContentLength: z.number().int().positive().default(1_000_000),

  // ── Display / search ──
  previewLength: z.number().int().min(10).default(100),
  searchDebounceMs: z.number().int().min(0).default(200),

  // ── Diagnostics ──
  logLevel: LogLevelSchema.default('info'),
});

// ─── Derived types ───

/** Full config after parsing (defaults applied, all fields present) */
export type ClipkeepConfigParsed = z.infer<typeof ClipkeepConfigSchema>;

export type ConfigKey = keyof ClipkeepConfigParsed;

// ─── Migration system ───

export const CURRENT_CONFIG_VERSION = 2;

export type ConfigMigration = (config: Record<string, unknown>) => Record<string, unknown>;

/** Settings written by the first desktop release, as snake_case strings */
const LEGACY_KEYS: Record<string, ConfigKey> = {
  max_history: 'maxHistoryItems',
  monitor_interval: 'pollIntervalMs',
  clear_on_exit: 'clearOnExit',
  auto_clear: 'autoCleanupEnabled',
  monitor_enabled: 'monitorEnabled',
  preview_length: 'previewLength',
};

function coerceLegacy(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  return value;
}

/**
 * Ordered migrations: key = source version, value = transform to next version.
 * Legacy keys are read, never removed, so older builds keep working.
 */
export const CONFIG_MIGRATIONS: Record<number, ConfigMigration> = {
  0: (cfg) => ({ ...cfg, _version: 1 }),
  1: (cfg) => {
    const migrated: Record<string, unknown> = { ...cfg };
    for (const [legacy, key] of Object.entries(LEGACY_KEYS)) {
      if (legacy in cfg && !(key in cfg)) {
        migrated[key] = coerceLegacy(cfg[legacy]);
      }
    }
    migrated._version = 2;
    return migrated;
  },
};
