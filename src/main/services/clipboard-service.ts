/**
 * ClipboardService — the external interface of the history core.
 *
 * Hotkey handlers and the UI call these triggers with loosely typed values;
 * parameters are validated with the trigger schemas, then routed to the
 * store, search index and transform engine.
 *
 * Features:
 * - History paging and search
 * - Paste (full format or plain text only) and quick paste of the latest item
 * - Pin / unpin / toggle, delete, clear
 * - Text transforms and merges, stored as new items
 * - Change stream subscription and status
 * - Lifecycle: retention at startup, monitor start/stop, clear-on-exit
 *
 * @module clipboard-service
 */

import { createLogger } from './logger';
import type { ConfigService } from './config';
import type { HistoryStore } from './history-store';
import type { SearchIndex } from './search-index';
import type { ClipboardMonitor } from './clipboard-monitor';
import { applyTransform, merge, textOf } from './transform-engine';
import { InvalidParamsError } from '@shared/types';
import type { ClipItem, ClipPayload, ClipboardStatus, HistoryListener, MonitorStatus, PastePayload } from '@shared/types';
import { TriggerParamSchemas, validateTriggerParams } from '@shared/schemas/trigger-params';
import type { z } from 'zod';

const log = createLogger('Clipboard');

const IDLE_MONITOR: MonitorStatus = {
  running: false,
  ticks: 0,
  captures: 0,
  readFailures: 0,
  storageFailures: 0,
};

export interface ClipboardServiceDeps {
  store: HistoryStore;
  search: SearchIndex;
  config: ConfigService;
  /** Absent when the host drives captures itself */
  monitor?: ClipboardMonitor;
}

/**
 * What the OS layer writes back for an item. Plain-text-only paste keeps the
 * textual representation and drops formatting, images and file references.
 */
export function toPastePayload(payload: ClipPayload, plainTextOnly = false): PastePayload {
  switch (payload.kind) {
    case 'text':
      return { text: payload.text };
    case 'rich_text':
      if (plainTextOnly) return { text: payload.plainText };
      return payload.format === 'html'
        ? { text: payload.plainText, html: payload.content }
        : { text: payload.plainText, rtf: payload.content };
    case 'image':
      return plainTextOnly ? {} : { image: { data: payload.data, mimeType: payload.mimeType } };
    case 'file_list': {
      const text = payload.paths.join('\n');
      return plainTextOnly ? { text } : { files: [...payload.paths], text };
    }
  }
}

export class ClipboardService {
  private readonly store: HistoryStore;
  private readonly search: SearchIndex;
  private readonly config: ConfigService;
  private readonly monitor: ClipboardMonitor | null;
  private unsubscribers: Array<() => void> = [];

  constructor(deps: ClipboardServiceDeps) {
    this.store = deps.store;
    this.search = deps.search;
    this.config = deps.config;
    this.monitor = deps.monitor ?? null;
  }

  /**
   * Apply retention and capacity, follow config changes and start monitoring
   * when enabled.
   */
  initialize(): void {
    const retentionDays = this.config.get('retentionDays');
    if (retentionDays > 0) this.store.applyRetention(retentionDays);
    this.store.enforceCapacity();

    this.unsubscribers.push(
      this.config.onChange('maxHistoryItems', (maxHistoryItems) => {
        this.store.setOptions({ maxHistoryItems });
        this.store.enforceCapacity();
      }),
      this.config.onChange('autoCleanupEnabled', (autoCleanupEnabled) => {
        this.store.setOptions({ autoCleanupEnabled });
        this.store.enforceCapacity();
      }),
      this.config.onChange('previewLength', (previewLength) => {
        this.store.setOptions({ previewLength });
        this.monitor?.setOptions({ previewLength });
      }),
      this.config.onChange('pollIntervalMs', (pollIntervalMs) => this.monitor?.setOptions({ pollIntervalMs })),
      this.config.onChange('readTimeoutMs', (readTimeoutMs) => this.monitor?.setOptions({ readTimeoutMs })),
      this.config.onChange('maxContentLength', (maxContentLength) => this.monitor?.setOptions({ maxContentLength })),
      this.config.onChange('searchDebounceMs', (ms) => this.search.setDebounceMs(ms)),
      this.config.onChange('monitorEnabled', (enabled) => {
        if (enabled) {
          this.monitor?.start();
        } else {
          this.monitor?.stop().catch((err: unknown) => log.error('Failed to stop monitor:', err));
        }
      }),
    );

    if (this.config.get('monitorEnabled')) this.monitor?.start();
    log.info('Clipboard service initialized');
  }

  /**
   * Stop monitoring (waiting for an in-flight capture) and, when
   * `clearOnExit` is set, drop unpinned history.
   */
  async shutdown(): Promise<void> {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];

    await this.monitor?.stop();
    if (this.config.get('clearOnExit')) {
      const removed = this.store.clear(true);
      log.info(`Cleared ${removed} unpinned items on exit`);
    }
    log.info('Clipboard service shut down');
  }

  // ─── Triggers ───

  getHistory(limit?: number, offset?: number, query?: string): ClipItem[] {
    const [l, o, q] = this.validate('getHistory', TriggerParamSchemas.getHistory, [limit, offset, query]);
    return this.search.search(q ?? '', { limit: l, offset: o });
  }

  /**
   * Content to write back for `id`; marks the item as just used.
   */
  paste(id: number, plainTextOnly?: boolean): PastePayload {
    const [itemId, plain] = this.validate('paste', TriggerParamSchemas.paste, [id, plainTextOnly]);
    const item = this.store.touch(itemId);
    return toPastePayload(item.payload, plain ?? false);
  }

  /** Paste the top of the displayed history (pinned first); null when empty */
  quickPaste(plainTextOnly?: boolean): PastePayload | null {
    const [plain] = this.validate('quickPaste', TriggerParamSchemas.quickPaste, [plainTextOnly]);
    const [top] = this.store.list({ limit: 1 });
    if (!top) return null;
    return toPastePayload(this.store.touch(top.id).payload, plain ?? false);
  }

  pin(id: number): ClipItem {
    const [itemId] = this.validate('pin', TriggerParamSchemas.pin, [id]);
    return this.store.setPinned(itemId, true);
  }

  unpin(id: number): ClipItem {
    const [itemId] = this.validate('unpin', TriggerParamSchemas.unpin, [id]);
    return this.store.setPinned(itemId, false);
  }

  togglePin(id: number): ClipItem {
    const [itemId] = this.validate('togglePin', TriggerParamSchemas.togglePin, [id]);
    const item = this.store.requireItem(itemId);
    return this.store.setPinned(itemId, !item.pinned);
  }

  delete(id: number): void {
    const [itemId] = this.validate('delete', TriggerParamSchemas.delete, [id]);
    this.store.delete(itemId);
  }

  /**
   * Store a transformed copy of a text item. A transform that changes nothing
   * returns the source item and stores nothing.
   */
  transform(id: number, op: string): ClipItem {
    const [itemId, transformOp] = this.validate('transform', TriggerParamSchemas.transform, [id, op]);
    const source = this.store.requireItem(itemId);
    const original = textOf(source);
    const result = applyTransform(transformOp, original);
    if (result === original) return source;

    return this.store.replacePayload(itemId, { kind: 'text', text: result }).item;
  }

  /**
   * Join the text of several items, in the given order, into one new item.
   */
  merge(ids: number[]): ClipItem {
    const [itemIds] = this.validate('merge', TriggerParamSchemas.merge, [ids]);
    const texts = itemIds.map((id) => textOf(this.store.requireItem(id), 'merge'));
    return this.store.applyCapture(this.store.toCandidate({ kind: 'text', text: merge(texts) })).item;
  }

  /** Returns the number of removed items */
  clear(keepPinned?: boolean): number {
    const [keep] = this.validate('clear', TriggerParamSchemas.clear, [keepPinned]);
    return this.store.clear(keep ?? true);
  }

  getStatus(): ClipboardStatus {
    return {
      ...this.store.counts(),
      monitor: this.monitor?.getStatus() ?? { ...IDLE_MONITOR },
    };
  }

  onChange(listener: HistoryListener): () => void {
    return this.store.onChange(listener);
  }

  // ─── Private ───

  private validate<O>(operation: string, schema: z.ZodType<O, z.ZodTypeDef, unknown>, args: unknown[]): O {
    const result = validateTriggerParams(schema, args);
    if (!result.success) {
      log.warn(`Rejected ${operation} call:`, result.issues);
      throw new InvalidParamsError(operation, result.issues);
    }
    return result.params;
  }
}
