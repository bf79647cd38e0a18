import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

// ─── Mocks ───
vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
  })),
}));

import {
  DatabaseService,
  SCHEMA_VERSION,
  defaultDatabasePath,
  resolveDataDir,
  storageErrorKind,
} from '../src/main/services/database-service';
import { HistoryStore } from '../src/main/services/history-store';
import { NotFoundError, StorageError } from '../src/shared/types';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipkeep-db-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

// =============================================================================
// Data directory
// =============================================================================
describe('data directory', () => {
  it('uses CLIPKEEP_DATA_DIR when set', () => {
    expect(resolveDataDir({ CLIPKEEP_DATA_DIR: '/srv/clipkeep' })).toBe('/srv/clipkeep');
    expect(defaultDatabasePath({ CLIPKEEP_DATA_DIR: '/srv/clipkeep' })).toBe(path.join('/srv/clipkeep', 'clipkeep.db'));
  });

  it('falls back to ~/.clipkeep', () => {
    expect(resolveDataDir({})).toBe(path.join(os.homedir(), '.clipkeep'));
  });
});

// =============================================================================
// Lifecycle & migrations
// =============================================================================
describe('DatabaseService', () => {
  it('creates the schema at the current version', () => {
    const db = new DatabaseService(':memory:');
    db.initialize();

    expect(db.isReady()).toBe(true);
    expect(db.getSchemaVersion()).toBe(SCHEMA_VERSION);
    db.close();
    expect(db.isReady()).toBe(false);
  });

  it('creates the data directory for a new file', () => {
    const file = path.join(dir, 'nested', 'clipkeep.db');
    const db = new DatabaseService(file);
    db.initialize();

    expect(fs.existsSync(file)).toBe(true);
    db.close();
  });

  it('is idempotent across reopen', () => {
    const file = path.join(dir, 'clipkeep.db');
    const first = new DatabaseService(file);
    first.initialize();
    first.close();

    const second = new DatabaseService(file);
    second.initialize();
    expect(second.getSchemaVersion()).toBe(SCHEMA_VERSION);
    second.close();
  });

  it('upgrades a version 1 database without losing rows', () => {
    const file = path.join(dir, 'clipkeep.db');
    const legacy = new Database(file);
    legacy.exec(`
      CREATE TABLE schema_version (version INTEGER PRIMARY KEY, applied_at TEXT NOT NULL DEFAULT (datetime('now')));
      CREATE TABLE clip_items (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        kind TEXT NOT NULL,
        text TEXT, rich_format TEXT, rich_content TEXT,
        image_data BLOB, image_mime TEXT, file_paths TEXT,
        fingerprint TEXT NOT NULL, preview TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL, last_used_at INTEGER NOT NULL, pinned INTEGER NOT NULL DEFAULT 0
      );
      CREATE TABLE settings (key TEXT PRIMARY KEY, value TEXT NOT NULL);
      INSERT INTO schema_version (version) VALUES (1);
      INSERT INTO clip_items (kind, text, fingerprint, preview, created_at, last_used_at, pinned)
        VALUES ('text', 'kept across upgrade', 'fp-1', 'kept across upgrade', 10, 20, 1);
    `);
    legacy.close();

    const db = new DatabaseService(file);
    db.initialize();

    expect(db.getSchemaVersion()).toBe(2);
    const store = new HistoryStore(db);
    expect(store.list()).toEqual([
      {
        id: 1,
        kind: 'text',
        payload: { kind: 'text', text: 'kept across upgrade' },
        fingerprint: 'fp-1',
        preview: 'kept across upgrade',
        createdAt: 10,
        lastUsedAt: 20,
        pinned: true,
      },
    ]);
    db.close();
  });

  it('reports a file that is not a database as corrupt', () => {
    const file = path.join(dir, 'clipkeep.db');
    fs.writeFileSync(file, 'not a database '.repeat(64));

    const db = new DatabaseService(file);
    try {
      db.initialize();
      expect.unreachable('initialize should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(StorageError);
      expect(err).toMatchObject({ kind: 'corrupt', recoverable: false });
    }
    expect(db.isReady()).toBe(false);
  });

  it('refuses queries before initialize', () => {
    const db = new DatabaseService(':memory:');
    expect(() => db.getDb()).toThrow('Database is not open');
  });
});

// =============================================================================
// Error translation
// =============================================================================
describe('error translation', () => {
  it('maps constraint failures to constraint_violation', () => {
    const db = new DatabaseService(':memory:');
    db.initialize();

    try {
      db.run('Insert bad kind', () =>
        db
          .getDb()
          .prepare("INSERT INTO clip_items (kind, fingerprint, created_at, last_used_at) VALUES ('video', 'x', 1, 1)")
          .run(),
      );
      expect.unreachable('insert should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(StorageError);
      expect(err).toMatchObject({ kind: 'constraint_violation', recoverable: true });
    }
    db.close();
  });

  it('lets domain errors through a transaction unchanged', () => {
    const db = new DatabaseService(':memory:');
    db.initialize();

    expect(() =>
      db.transaction('Lookup', () => {
        throw new NotFoundError(7);
      }),
    ).toThrow(NotFoundError);
    db.close();
  });

  it('rolls back a failed transaction', () => {
    const db = new DatabaseService(':memory:');
    db.initialize();

    expect(() =>
      db.transaction('Write then fail', () => {
        db.prepare("INSERT INTO settings (key, value) VALUES ('a', '1')").run();
        throw new Error('boom');
      }),
    ).toThrow('Write then fail failed: boom');
    expect(db.getSettings()).toEqual({});
    db.close();
  });

  it('treats unknown errors as unavailable', () => {
    expect(storageErrorKind(new Error('disk I/O'))).toBe('unavailable');
    expect(storageErrorKind('not an error')).toBe('unavailable');
  });
});

// =============================================================================
// Settings table
// =============================================================================
describe('settings', () => {
  it('round-trips JSON values', () => {
    const db = new DatabaseService(':memory:');
    db.initialize();

    db.setSettings({ maxHistoryItems: 50, logLevel: 'debug', clearOnExit: true });
    db.setSettings({ maxHistoryItems: 60 });

    expect(db.getSettings()).toEqual({ maxHistoryItems: 60, logLevel: 'debug', clearOnExit: true });
    db.close();
  });

  it('returns values that are not JSON as strings', () => {
    const db = new DatabaseService(':memory:');
    db.initialize();
    db.getDb().prepare("INSERT INTO settings (key, value) VALUES ('hotkey', 'ctrl+alt+v')").run();

    expect(db.getSettings()).toEqual({ hotkey: 'ctrl+alt+v' });
    db.close();
  });
});
