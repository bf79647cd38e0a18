/**
 * DatabaseService — SQLite-backed persistent storage for clipkeep.
 *
 * Owns the better-sqlite3 connection: pragmas, ordered additive migrations,
 * a prepared statement cache, the key-value settings table, and translation of
 * driver errors into StorageError. The clip_items queries live in HistoryStore.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from './logger';
import { ClipError, StorageError, type StorageErrorKind } from '../../shared/types/errors';

const log = createLogger('DatabaseService');

// ─── Schema version for migrations ───
export const SCHEMA_VERSION = 2;

export const DATABASE_FILE = 'clipkeep.db';

/** `CLIPKEEP_DATA_DIR` or ~/.clipkeep */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.CLIPKEEP_DATA_DIR || path.join(os.homedir(), '.clipkeep');
}

export function defaultDatabasePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveDataDir(env), DATABASE_FILE);
}

/**
 * Classify a thrown driver error. Constraint codes come in several flavours
 * (SQLITE_CONSTRAINT_UNIQUE, _CHECK, ...), so match on the prefix.
 */
export function storageErrorKind(err: unknown): StorageErrorKind {
  const code = err instanceof Database.SqliteError ? err.code : '';
  if (code.startsWith('SQLITE_CONSTRAINT')) return 'constraint_violation';
  if (code.startsWith('SQLITE_CORRUPT') || code === 'SQLITE_NOTADB') return 'corrupt';
  return 'unavailable';
}

export function toStorageError(err: unknown, operation: string): StorageError {
  if (err instanceof StorageError) return err;
  const originalError = err instanceof Error ? err : new Error(String(err));
  return new StorageError(storageErrorKind(err), `${operation} failed: ${originalError.message}`, {
    originalError,
    context: { operation },
  });
}

/** Domain errors pass through; anything else is a storage failure */
function rethrowable(err: unknown, operation: string): ClipError {
  return err instanceof ClipError ? err : toStorageError(err, operation);
}

export class DatabaseService {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private stmtCache: Map<string, Database.Statement> = new Map();

  /**
   * @param dbPath - file path, or ':memory:' for an in-process database
   */
  constructor(dbPath: string = defaultDatabasePath()) {
    this.dbPath = dbPath;
  }

  // ─── Lifecycle ───

  initialize(): void {
    if (this.db) return;

    try {
      if (this.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }

      log.info(`Opening database at ${this.dbPath}`);
      const db = new Database(this.dbPath);
      this.db = db;

      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');
      db.pragma('temp_store = MEMORY');

      this.runMigrations(db);
    } catch (err) {
      this.closeQuietly();
      throw toStorageError(err, 'Database open');
    }

    log.info('Database initialized successfully');
  }

  close(): void {
    if (!this.db) return;
    this.stmtCache.clear();
    try {
      if (this.dbPath !== ':memory:') this.db.pragma('wal_checkpoint(TRUNCATE)');
      this.db.close();
      log.info('Database closed');
    } catch (err) {
      log.error('Error closing database:', err);
    }
    this.db = null;
  }

  isReady(): boolean {
    return this.db !== null && this.db.open;
  }

  /**
   * Raw connection. Throws StorageError('unavailable') when not initialized or already closed.
   */
  getDb(): Database.Database {
    if (!this.db || !this.db.open) {
      throw new StorageError('unavailable', 'Database is not open', { context: { path: this.dbPath } });
    }
    return this.db;
  }

  /** Cached prepared statement */
  prepare(sql: string): Database.Statement {
    const db = this.getDb();
    let stmt = this.stmtCache.get(sql);
    if (!stmt) {
      stmt = db.prepare(sql);
      this.stmtCache.set(sql, stmt);
    }
    return stmt;
  }

  /**
   * Run `fn` inside a transaction; driver errors surface as StorageError,
   * domain errors thrown by `fn` (NotFoundError, ...) pass through unchanged.
   * Nested calls become savepoints (better-sqlite3 semantics).
   */
  transaction<T>(operation: string, fn: () => T): T {
    const db = this.getDb();
    try {
      return db.transaction(fn)();
    } catch (err) {
      throw rethrowable(err, operation);
    }
  }

  /** Run a single statement-level operation with error translation */
  run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw rethrowable(err, operation);
    }
  }

  getSchemaVersion(): number {
    return readVersion(this.getDb());
  }

  // ─── Settings (key-value) ───

  /**
   * All settings, values JSON-decoded. Values that are not JSON (settings
   * written by older releases as bare strings) come back as strings.
   */
  getSettings(): Record<string, unknown> {
    return this.run('Read settings', () => {
      const rows = this.prepare('SELECT key, value FROM settings').raw(true).all();
      const out: Record<string, unknown> = {};
      for (const row of rows) {
        if (!Array.isArray(row)) continue;
        const [key, value] = row;
        if (typeof key === 'string' && typeof value === 'string') {
          out[key] = decodeSetting(value);
        }
      }
      return out;
    });
  }

  setSettings(values: Record<string, unknown>): void {
    const stmt = this.prepare(
      `INSERT INTO settings (key, value) VALUES (?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
    );
    this.transaction('Write settings', () => {
      for (const [key, value] of Object.entries(values)) {
        stmt.run(key, JSON.stringify(value));
      }
    });
  }

  // ─── Migrations ───

  private runMigrations(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const version = readVersion(db);

    if (version < 1) db.transaction(() => this.migrateV1(db))();
    if (version < 2) db.transaction(() => this.migrateV2(db))();
  }

  private migrateV1(db: Database.Database): void {
    log.info('Running migration v1: clip_items + settings');

    db.exec(`
      CREATE TABLE IF NOT EXISTS clip_items (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        kind TEXT NOT NULL CHECK(kind IN ('text', 'rich_text', 'image', 'file_list')),
        text TEXT,
        rich_format TEXT CHECK(rich_format IS NULL OR rich_format IN ('html', 'rtf')),
        rich_content TEXT,
        image_data BLOB,
        image_mime TEXT,
        file_paths TEXT,
        fingerprint TEXT NOT NULL,
        preview TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL,
        last_used_at INTEGER NOT NULL,
        pinned INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_clip_items_fingerprint ON clip_items(fingerprint);
      CREATE INDEX IF NOT EXISTS idx_clip_items_last_used ON clip_items(last_used_at DESC);

      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      INSERT INTO schema_version (version) VALUES (1);
    `);
  }

  private migrateV2(db: Database.Database): void {
    log.info('Running migration v2: image dimensions + display-order index');

    db.exec(`
      ALTER TABLE clip_items ADD COLUMN image_width INTEGER;
      ALTER TABLE clip_items ADD COLUMN image_height INTEGER;

      CREATE INDEX IF NOT EXISTS idx_clip_items_order ON clip_items(pinned DESC, last_used_at DESC, id DESC);

      INSERT INTO schema_version (version) VALUES (2);
    `);
  }

  private closeQuietly(): void {
    this.stmtCache.clear();
    try {
      this.db?.close();
    } catch (err) {
      log.warn('Error closing database after failed open:', err);
    }
    this.db = null;
  }
}

function readVersion(db: Database.Database): number {
  const v = db.prepare('SELECT MAX(version) FROM schema_version').pluck().get();
  return typeof v === 'number' ? v : 0;
}

function decodeSetting(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
