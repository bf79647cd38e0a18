/**
 * HistoryStore — durable, ordered collection of clipboard history items.
 *
 * Features:
 * - Display order: pinned first, then unpinned, each by lastUsedAt desc
 * - Capture pipeline (dedup decision + write + eviction) in one transaction
 * - Capacity eviction after every insert, never touching pinned items
 * - Change stream emitted after each committed mutation
 * - Retention policy for unpinned items unused for N days
 *
 * better-sqlite3 is synchronous and Node runs every call on one thread, so each
 * public method runs to completion before any other store call starts.
 *
 * @module history-store
 */

import { z } from 'zod';
import { createLogger } from './logger';
import { DatabaseService } from './database-service';
import { buildPreview, DEFAULT_PREVIEW_LENGTH, fingerprintPayload } from './content-classifier';
import { decideDedup } from './deduplicator';
import { filterItems } from './search-index';
import { NotFoundError, StorageError } from '@shared/types';
import type {
  ClipCandidate,
  ClipItem,
  ClipPayload,
  DeleteReason,
  HistoryCounts,
  HistoryEvent,
  HistoryListener,
  HistoryQuery,
  ImagePayload,
} from '@shared/types';

const log = createLogger('HistoryStore');

/** Default max unpinned history entries */
export const DEFAULT_MAX_HISTORY = 1000;

const DAY_MS = 24 * 60 * 60 * 1000;

const ORDER_BY = 'ORDER BY pinned DESC, last_used_at DESC, id DESC';

export interface HistoryStoreOptions {
  maxHistoryItems: number;
  autoCleanupEnabled: boolean;
  previewLength: number;
  /** Epoch ms clock */
  now: () => number;
}

export type CaptureOutcome =
  | { action: 'inserted'; item: ClipItem; evicted: number[] }
  | { action: 'promoted'; item: ClipItem; replacedId: number; evicted: number[] }
  | { action: 'touched'; item: ClipItem };

// ─── Row mapping ───

const ClipItemRowSchema = z.object({
  id: z.number().int(),
  kind: z.enum(['text', 'rich_text', 'image', 'file_list']),
  text: z.string().nullable(),
  rich_format: z.enum(['html', 'rtf']).nullable(),
  rich_content: z.string().nullable(),
  image_data: z.instanceof(Buffer).nullable(),
  image_mime: z.string().nullable(),
  image_width: z.number().int().nullable(),
  image_height: z.number().int().nullable(),
  file_paths: z.string().nullable(),
  fingerprint: z.string(),
  preview: z.string(),
  created_at: z.number(),
  last_used_at: z.number(),
  pinned: z.number(),
});

export type ClipItemRow = z.infer<typeof ClipItemRowSchema>;

const FilePathsSchema = z.array(z.string());

function corrupt(message: string, id?: number): StorageError {
  return new StorageError('corrupt', message, { context: id === undefined ? undefined : { id } });
}

export function rowToItem(raw: unknown): ClipItem {
  const parsed = ClipItemRowSchema.safeParse(raw);
  if (!parsed.success) {
    throw corrupt(`Malformed clip_items row: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
  }
  const row = parsed.data;

  return {
    id: row.id,
    kind: row.kind,
    payload: rowToPayload(row),
    fingerprint: row.fingerprint,
    preview: row.preview,
    createdAt: row.created_at,
    lastUsedAt: row.last_used_at,
    pinned: row.pinned === 1,
  };
}

function rowToPayload(row: ClipItemRow): ClipPayload {
  switch (row.kind) {
    case 'text':
      if (row.text === null) throw corrupt('Text item without text', row.id);
      return { kind: 'text', text: row.text };
    case 'rich_text':
      if (row.text === null || row.rich_format === null || row.rich_content === null) {
        throw corrupt('Rich text item without content', row.id);
      }
      return { kind: 'rich_text', format: row.rich_format, content: row.rich_content, plainText: row.text };
    case 'image': {
      if (row.image_data === null || row.image_mime === null) throw corrupt('Image item without data', row.id);
      const image: ImagePayload = { kind: 'image', mimeType: row.image_mime, data: row.image_data };
      if (row.image_width !== null && row.image_height !== null) {
        image.width = row.image_width;
        image.height = row.image_height;
      }
      return image;
    }
    case 'file_list': {
      let decoded: unknown;
      try {
        decoded = JSON.parse(row.file_paths ?? '');
      } catch {
        throw corrupt('File list is not valid JSON', row.id);
      }
      const paths = FilePathsSchema.safeParse(decoded);
      if (!paths.success) throw corrupt('File list is not a string array', row.id);
      return { kind: 'file_list', paths: paths.data };
    }
  }
}

function payloadColumns(payload: ClipPayload): Record<string, string | number | Buffer | null> {
  const cols: Record<string, string | number | Buffer | null> = {
    text: null,
    rich_format: null,
    rich_content: null,
    image_data: null,
    image_mime: null,
    image_width: null,
    image_height: null,
    file_paths: null,
  };
  switch (payload.kind) {
    case 'text':
      cols.text = payload.text;
      break;
    case 'rich_text':
      cols.text = payload.plainText;
      cols.rich_format = payload.format;
      cols.rich_content = payload.content;
      break;
    case 'image':
      cols.image_data = payload.data;
      cols.image_mime = payload.mimeType;
      cols.image_width = payload.width ?? null;
      cols.image_height = payload.height ?? null;
      break;
    case 'file_list':
      cols.file_paths = JSON.stringify(payload.paths);
      break;
  }
  return cols;
}

// ─── HistoryStore ───

export class HistoryStore {
  private readonly db: DatabaseService;
  private options: HistoryStoreOptions;
  private listeners = new Set<HistoryListener>();
  /** Highest timestamp handed out; keeps recency strictly ordered when the clock repeats */
  private lastStamp: number | null = null;

  constructor(db: DatabaseService, options: Partial<HistoryStoreOptions> = {}) {
    this.db = db;
    this.options = {
      maxHistoryItems: DEFAULT_MAX_HISTORY,
      autoCleanupEnabled: true,
      previewLength: DEFAULT_PREVIEW_LENGTH,
      now: Date.now,
      ...options,
    };
  }

  setOptions(options: Partial<Omit<HistoryStoreOptions, 'now'>>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): Readonly<HistoryStoreOptions> {
    return this.options;
  }

  // ─── Change stream ───

  /**
   * Subscribe to committed mutations. Returns an unsubscribe function.
   */
  onChange(listener: HistoryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── Capture pipeline ───

  /**
   * Dedup and store a classified candidate as a single unit: either every
   * step commits or none does.
   */
  applyCapture(candidate: ClipCandidate): CaptureOutcome {
    return this.commit<CaptureOutcome>('Capture', (events) => {
      const decision = decideDedup(candidate, {
        mostRecent: this.mostRecent(),
        unpinnedMatch: this.findByFingerprint(candidate.fingerprint, false),
        pinnedMatch: this.findByFingerprint(candidate.fingerprint, true),
      });

      switch (decision.action) {
        case 'touch':
          return { action: 'touched', item: this.touchInTx(decision.id, events) };
        case 'promote': {
          this.deleteInTx(decision.staleId, 'promoted', events);
          const item = this.insertInTx(candidate, events);
          return { action: 'promoted', item, replacedId: decision.staleId, evicted: this.evictInTx(events) };
        }
        case 'insert': {
          const item = this.insertInTx(candidate, events);
          return { action: 'inserted', item, evicted: this.evictInTx(events) };
        }
      }
    });
  }

  // ─── Mutations ───

  /**
   * Store a candidate as a new row (no dedup) and run the capacity check.
   */
  insert(candidate: ClipCandidate): ClipItem {
    return this.commit('Insert', (events) => {
      const item = this.insertInTx(candidate, events);
      this.evictInTx(events);
      return item;
    });
  }

  /** Bump lastUsedAt (re-copy, paste) */
  touch(id: number): ClipItem {
    return this.commit('Touch', (events) => this.touchInTx(id, events));
  }

  /**
   * Pin or unpin. Unpinning an item whose content also exists as an unpinned
   * row collapses the two, keeping the item being unpinned. Unpinning never
   * evicts; the next insert trims the history back to the limit.
   */
  setPinned(id: number, pinned: boolean): ClipItem {
    return this.commit('Set pinned', (events) => {
      const current = this.requireItem(id);
      if (current.pinned === pinned) return current;

      if (!pinned) {
        const twin = this.findByFingerprint(current.fingerprint, false);
        if (twin) this.deleteInTx(twin.id, 'promoted', events);
      }

      this.db.prepare('UPDATE clip_items SET pinned = ? WHERE id = ?').run(pinned ? 1 : 0, id);
      const item = this.requireItem(id);
      events.push({ type: 'item_updated', item, reason: pinned ? 'pinned' : 'unpinned' });
      return item;
    });
  }

  delete(id: number): void {
    this.commit('Delete', (events) => this.deleteInTx(id, 'user', events));
  }

  /**
   * Store a transformed copy of `id` as a new item; the source row is left as is.
   * The copy goes through dedup, so a result identical to existing content
   * reuses that row instead of duplicating it.
   */
  replacePayload(id: number, payload: ClipPayload): CaptureOutcome {
    this.requireItem(id);
    return this.applyCapture(this.toCandidate(payload));
  }

  /**
   * Bulk delete. Returns the number of removed rows.
   */
  clear(keepPinned = true): number {
    return this.commit('Clear', (events) => {
      const where = keepPinned ? 'WHERE pinned = 0' : '';
      const ids = this.selectIds(`SELECT id FROM clip_items ${where} ORDER BY id`);
      this.db.prepare(`DELETE FROM clip_items ${where}`).run();
      for (const id of ids) events.push({ type: 'item_deleted', id, reason: 'cleared' });
      if (ids.length > 0) log.info(`Cleared ${ids.length} history items`);
      return ids.length;
    });
  }

  /**
   * Trim unpinned items down to the configured limit (no-op when within it
   * or when auto cleanup is disabled). Returns evicted ids.
   */
  enforceCapacity(): number[] {
    return this.commit('Capacity cleanup', (events) => this.evictInTx(events));
  }

  /**
   * Delete unpinned items not used for `days` days. 0 disables the policy.
   */
  applyRetention(days: number): number {
    if (days <= 0) return 0;
    const cutoff = this.options.now() - days * DAY_MS;

    return this.commit('Retention cleanup', (events) => {
      const ids = this.selectIds('SELECT id FROM clip_items WHERE pinned = 0 AND last_used_at < ? ORDER BY id', cutoff);
      for (const id of ids) this.deleteRow(id);
      for (const id of ids) events.push({ type: 'item_deleted', id, reason: 'retention' });
      if (ids.length > 0) log.info(`Retention policy: deleted ${ids.length} old history items`);
      return ids.length;
    });
  }

  // ─── Queries ───

  /**
   * History in display order. A non-empty `query` filters through the search
   * matcher before paging.
   */
  list(query: HistoryQuery = {}): ClipItem[] {
    const limit = query.limit ?? -1;
    const offset = query.offset ?? 0;

    return this.db.run('List history', () => {
      if (query.query && query.query.trim()) {
        const all = this.db.prepare(`SELECT * FROM clip_items ${ORDER_BY}`).all().map(rowToItem);
        const matched = filterItems(all, query.query);
        return limit < 0 ? matched.slice(offset) : matched.slice(offset, offset + limit);
      }

      return this.db.prepare(`SELECT * FROM clip_items ${ORDER_BY} LIMIT ? OFFSET ?`).all(limit, offset).map(rowToItem);
    });
  }

  getById(id: number): ClipItem | null {
    return this.db.run('Get item', () => {
      const row = this.db.prepare('SELECT * FROM clip_items WHERE id = ?').get(id);
      return row === undefined ? null : rowToItem(row);
    });
  }

  /** Throws NotFoundError for a missing id */
  requireItem(id: number): ClipItem {
    const item = this.getById(id);
    if (!item) throw new NotFoundError(id);
    return item;
  }

  /** Most recently used item, pinned or not */
  mostRecent(): ClipItem | null {
    return this.db.run('Get most recent', () => {
      const row = this.db.prepare('SELECT * FROM clip_items ORDER BY last_used_at DESC, id DESC LIMIT 1').get();
      return row === undefined ? null : rowToItem(row);
    });
  }

  findByFingerprint(fingerprint: string, pinned: boolean): ClipItem | null {
    return this.db.run('Find by fingerprint', () => {
      const row = this.db
        .prepare('SELECT * FROM clip_items WHERE fingerprint = ? AND pinned = ? ORDER BY last_used_at DESC, id DESC LIMIT 1')
        .get(fingerprint, pinned ? 1 : 0);
      return row === undefined ? null : rowToItem(row);
    });
  }

  counts(): HistoryCounts {
    return this.db.run('Count history', () => {
      const total = this.countWhere('');
      const pinned = this.countWhere('WHERE pinned = 1');
      return { total, pinned, unpinned: total - pinned };
    });
  }

  /** Candidate for a payload built outside the classifier (transforms, merges) */
  toCandidate(payload: ClipPayload): ClipCandidate {
    return {
      payload,
      fingerprint: fingerprintPayload(payload),
      preview: buildPreview(payload, this.options.previewLength),
    };
  }

  // ─── Private: transactional steps ───

  /**
   * Run `fn` in a transaction and publish the collected events once it commits.
   */
  private commit<T>(operation: string, fn: (events: HistoryEvent[]) => T): T {
    const events: HistoryEvent[] = [];
    const result = this.db.transaction(operation, () => fn(events));
    this.publish(events);
    return result;
  }

  private insertInTx(candidate: ClipCandidate, events: HistoryEvent[]): ClipItem {
    const now = this.stamp();
    const info = this.db
      .prepare(
        `INSERT INTO clip_items
         (kind, text, rich_format, rich_content, image_data, image_mime, image_width, image_height,
          file_paths, fingerprint, preview, created_at, last_used_at, pinned)
         VALUES (@kind, @text, @rich_format, @rich_content, @image_data, @image_mime, @image_width, @image_height,
          @file_paths, @fingerprint, @preview, @created_at, @last_used_at, 0)`,
      )
      .run({
        kind: candidate.payload.kind,
        ...payloadColumns(candidate.payload),
        fingerprint: candidate.fingerprint,
        preview: candidate.preview,
        created_at: now,
        last_used_at: now,
      });

    const item = this.requireItem(Number(info.lastInsertRowid));
    events.push({ type: 'item_inserted', item });
    return item;
  }

  private touchInTx(id: number, events: HistoryEvent[]): ClipItem {
    const info = this.db.prepare('UPDATE clip_items SET last_used_at = ? WHERE id = ?').run(this.stamp(), id);
    if (info.changes === 0) throw new NotFoundError(id);
    const item = this.requireItem(id);
    events.push({ type: 'item_updated', item, reason: 'touched' });
    return item;
  }

  private deleteInTx(id: number, reason: DeleteReason, events: HistoryEvent[]): void {
    if (!this.deleteRow(id)) throw new NotFoundError(id);
    events.push({ type: 'item_deleted', id, reason });
  }

  private evictInTx(events: HistoryEvent[]): number[] {
    if (!this.options.autoCleanupEnabled) return [];

    const unpinned = this.countWhere('WHERE pinned = 0');
    const excess = unpinned - this.options.maxHistoryItems;
    if (excess <= 0) return [];

    const ids = this.selectIds(
      'SELECT id FROM clip_items WHERE pinned = 0 ORDER BY last_used_at ASC, id ASC LIMIT ?',
      excess,
    );
    for (const id of ids) {
      this.deleteRow(id);
      events.push({ type: 'item_deleted', id, reason: 'evicted' });
    }
    log.debug(`Evicted ${ids.length} items over the ${this.options.maxHistoryItems} limit`);
    return ids;
  }

  // ─── Private: helpers ───

  private deleteRow(id: number): boolean {
    return this.db.prepare('DELETE FROM clip_items WHERE id = ?').run(id).changes > 0;
  }

  private selectIds(sql: string, ...params: number[]): number[] {
    const ids = this.db.prepare(sql).pluck().all(...params);
    return ids.filter((id): id is number => typeof id === 'number');
  }

  private countWhere(where: string): number {
    const count = this.db.prepare(`SELECT COUNT(*) FROM clip_items ${where}`).pluck().get();
    return typeof count === 'number' ? count : 0;
  }

  /** Clock reading, strictly greater than every timestamp handed out before */
  private stamp(): number {
    if (this.lastStamp === null) {
      const max = this.db.prepare('SELECT MAX(last_used_at) FROM clip_items').pluck().get();
      this.lastStamp = typeof max === 'number' ? max : 0;
    }
    this.lastStamp = Math.max(this.options.now(), this.lastStamp + 1);
    return this.lastStamp;
  }

  private publish(events: HistoryEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          log.error(`History listener error for ${event.type}:`, err);
        }
      }
    }
  }
}
