/**
 * Clipboard history types — shared between the service core and its consumers.
 *
 * @module clip
 */

/** Content kind of a history item */
export type ClipKind = 'text' | 'rich_text' | 'image' | 'file_list';

export type RichTextFormat = 'html' | 'rtf';

export interface TextPayload {
  kind: 'text';
  text: string;
}

export interface RichTextPayload {
  kind: 'rich_text';
  format: RichTextFormat;
  /** Formatted source (HTML markup or RTF document) */
  content: string;
  /** Unformatted fallback, used for dedup and search */
  plainText: string;
}

export interface ImagePayload {
  kind: 'image';
  mimeType: string;
  data: Buffer;
  width?: number;
  height?: number;
}

export interface FileListPayload {
  kind: 'file_list';
  /** Ordered, as exposed by the clipboard */
  paths: string[];
}

export type ClipPayload = TextPayload | RichTextPayload | ImagePayload | FileListPayload;

/** Classified clipboard content that has not been stored yet */
export interface ClipCandidate {
  payload: ClipPayload;
  fingerprint: string;
  preview: string;
}

/** Single stored history item */
export interface ClipItem extends ClipCandidate {
  id: number;
  kind: ClipKind;
  /** Epoch ms */
  createdAt: number;
  /** Epoch ms, bumped on re-copy and paste */
  lastUsedAt: number;
  pinned: boolean;
}

/**
 * Raw clipboard state as exposed by the OS. Every representation is optional;
 * several may be present at once.
 */
export interface ClipboardSnapshot {
  text?: string;
  html?: string;
  rtf?: string;
  image?: {
    data: Buffer;
    mimeType: string;
    width?: number;
    height?: number;
  };
  files?: string[];
  /** OS change counter, when the platform exposes one */
  sequence?: number;
}

// ─── Queries ───

export interface HistoryQuery {
  limit?: number;
  offset?: number;
  /** Case-insensitive substring filter; empty = no filter */
  query?: string;
}

export interface HistoryCounts {
  total: number;
  pinned: number;
  unpinned: number;
}

// ─── Change notifications ───

export type DeleteReason = 'user' | 'promoted' | 'evicted' | 'cleared' | 'retention';

export type UpdateReason = 'touched' | 'pinned' | 'unpinned';

export type HistoryEvent =
  | { type: 'item_inserted'; item: ClipItem }
  | { type: 'item_updated'; item: ClipItem; reason: UpdateReason }
  | { type: 'item_deleted'; id: number; reason: DeleteReason };

export type HistoryListener = (event: HistoryEvent) => void;

// ─── Transforms ───

export type TransformOp = 'upper' | 'lower' | 'title_case' | 'trim';

export const TRANSFORM_OPS: readonly TransformOp[] = ['upper', 'lower', 'title_case', 'trim'];

// ─── Paste ───

/** What the OS layer should write back to the clipboard */
export interface PastePayload {
  text?: string;
  html?: string;
  rtf?: string;
  image?: { data: Buffer; mimeType: string };
  files?: string[];
}

// ─── Status ───

export interface MonitorStatus {
  running: boolean;
  /** ISO timestamp */
  startedAt?: string;
  ticks: number;
  captures: number;
  readFailures: number;
  storageFailures: number;
}

export interface ClipboardStatus extends HistoryCounts {
  monitor: MonitorStatus;
}
