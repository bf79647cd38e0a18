/**
 * Search index — incremental, debounced text search over the bounded history.
 *
 * History never holds more than `maxHistoryItems` unpinned rows plus the
 * pinned ones, so a linear case-insensitive scan is fast enough and no
 * inverted index is kept.
 *
 * Debouncing is modelled as a pure decision over (pending query, now, window):
 * keystrokes call `submit()`, a UI timer or the next keystroke calls
 * `flush()`, and only the latest query runs once its window has elapsed.
 *
 * @module search-index
 */

import { fileNameOf } from './content-classifier';
import type { ClipItem, HistoryQuery } from '@shared/types';

/** Default debounce window (ms) */
export const DEFAULT_SEARCH_DEBOUNCE_MS = 200;

export interface HistoryReader {
  list(query?: HistoryQuery): ClipItem[];
}

export interface PendingQuery {
  query: string;
  /** Epoch ms of the keystroke that produced this query */
  submittedAt: number;
}

export type DebounceDecision = 'execute' | 'suppress';

export interface SearchResult {
  query: string;
  items: ClipItem[];
}

// ─── Pure helpers ───

/**
 * Run the pending query only when no newer keystroke arrived within the window.
 */
export function debounceDecision(pending: PendingQuery | null, now: number, windowMs: number): DebounceDecision {
  if (!pending) return 'suppress';
  return now - pending.submittedAt >= windowMs ? 'execute' : 'suppress';
}

/** Text the query is matched against; empty for images */
export function searchableTexts(item: ClipItem): string[] {
  const { payload } = item;
  switch (payload.kind) {
    case 'text':
      return [payload.text];
    case 'rich_text':
      return [payload.plainText];
    case 'file_list':
      return payload.paths.map(fileNameOf);
    case 'image':
      return [];
  }
}

export function matchesQuery(item: ClipItem, query: string): boolean {
  const needle = query.trim().toLowerCase();
  if (!needle) return true;
  return searchableTexts(item).some((text) => text.toLowerCase().includes(needle));
}

/**
 * Filter items that are already in display order (pinned first, most recently
 * used first); the order is preserved.
 */
export function filterItems(items: ClipItem[], query: string): ClipItem[] {
  if (!query.trim()) return items;
  return items.filter((item) => matchesQuery(item, query));
}

// ─── SearchIndex ───

export class SearchIndex {
  private readonly store: HistoryReader;
  private debounceMs: number;
  private pending: PendingQuery | null = null;

  constructor(store: HistoryReader, debounceMs: number = DEFAULT_SEARCH_DEBOUNCE_MS) {
    this.store = store;
    this.debounceMs = debounceMs;
  }

  setDebounceMs(ms: number): void {
    this.debounceMs = ms;
  }

  /**
   * Immediate search, for callers that already coalesce keystrokes.
   * An empty query returns the unfiltered history.
   */
  search(query: string, options: { limit?: number; offset?: number } = {}): ClipItem[] {
    return this.store.list({ ...options, query });
  }

  /** Record a keystroke-driven query; supersedes any pending one */
  submit(query: string, now: number): void {
    this.pending = { query, submittedAt: now };
  }

  getPending(): PendingQuery | null {
    return this.pending ? { ...this.pending } : null;
  }

  /**
   * Execute the pending query if its debounce window has elapsed.
   * Returns null while suppressed or when nothing is pending.
   */
  flush(now: number, options: { limit?: number; offset?: number } = {}): SearchResult | null {
    const pending = this.pending;
    if (!pending || debounceDecision(pending, now, this.debounceMs) === 'suppress') return null;

    this.pending = null;
    return { query: pending.query, items: this.search(pending.query, options) };
  }

  cancel(): void {
    this.pending = null;
  }
}
