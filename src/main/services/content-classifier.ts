/**
 * Content classifier — turns a raw clipboard snapshot into a typed candidate.
 *
 * Kind priority when several representations are present:
 *   file_list > image > rich_text > text
 *
 * The fingerprint is a sha256 over kind-tagged canonical bytes. Rich text hashes
 * its plain-text fallback under the `text` tag, so copying the same visible text
 * from a browser and from an editor collapses into one history row.
 *
 * @module content-classifier
 */

import { createHash } from 'crypto';
import * as path from 'path';
import { createLogger } from './logger';
import type { ClipCandidate, ClipPayload, ClipboardSnapshot, ImagePayload, RichTextPayload } from '@shared/types';

const log = createLogger('Classifier');

/** Preview length for display (chars) */
export const DEFAULT_PREVIEW_LENGTH = 100;

/** Texts above this length are not recorded (chars) */
export const DEFAULT_MAX_CONTENT_LENGTH = 1_000_000;

export interface ClassifierOptions {
  previewLength: number;
  maxContentLength: number;
}

const DEFAULT_OPTIONS: ClassifierOptions = {
  previewLength: DEFAULT_PREVIEW_LENGTH,
  maxContentLength: DEFAULT_MAX_CONTENT_LENGTH,
};

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

// ─── Classification ───

/**
 * Classify a snapshot. Returns `null` when there is nothing worth recording:
 * an empty clipboard, whitespace-only text, unsupported representations only,
 * or text above `maxContentLength`.
 */
export function classify(snapshot: ClipboardSnapshot, options: Partial<ClassifierOptions> = {}): ClipCandidate | null {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const payload = selectPayload(snapshot);
  if (!payload) return null;

  const plain = plainTextOf(payload);
  if (plain !== null && plain.length > opts.maxContentLength) {
    log.warn(`Clipboard content too long (${plain.length} chars), skipping`);
    return null;
  }

  return {
    payload,
    fingerprint: fingerprintPayload(payload),
    preview: buildPreview(payload, opts.previewLength),
  };
}

function selectPayload(snapshot: ClipboardSnapshot): ClipPayload | null {
  const files = (snapshot.files ?? []).map((f) => f.trim()).filter((f) => f.length > 0);
  if (files.length > 0) {
    return { kind: 'file_list', paths: files };
  }

  if (snapshot.image && snapshot.image.data.length > 0) {
    const { data, mimeType } = snapshot.image;
    const size = snapshot.image.width && snapshot.image.height
      ? { width: snapshot.image.width, height: snapshot.image.height }
      : readPngSize(data);
    const image: ImagePayload = { kind: 'image', mimeType, data };
    if (size) {
      image.width = size.width;
      image.height = size.height;
    }
    return image;
  }

  const rich = selectRichText(snapshot);
  if (rich) return rich;

  if (snapshot.text !== undefined && snapshot.text.trim().length > 0) {
    return { kind: 'text', text: snapshot.text };
  }

  return null;
}

function selectRichText(snapshot: ClipboardSnapshot): RichTextPayload | null {
  const hasText = snapshot.text !== undefined && snapshot.text.trim().length > 0;

  if (snapshot.html && snapshot.html.trim()) {
    const plainText = hasText && snapshot.text ? snapshot.text : stripHtml(snapshot.html);
    if (plainText.trim()) return { kind: 'rich_text', format: 'html', content: snapshot.html, plainText };
  }

  if (snapshot.rtf && snapshot.rtf.trim()) {
    const plainText = hasText && snapshot.text ? snapshot.text : stripRtf(snapshot.rtf);
    if (plainText.trim()) return { kind: 'rich_text', format: 'rtf', content: snapshot.rtf, plainText };
  }

  return null;
}

// ─── Fingerprint ───

/**
 * Deterministic content hash. Depends on the payload only, never on timestamps.
 */
export function fingerprintPayload(payload: ClipPayload): string {
  const hash = createHash('sha256');
  switch (payload.kind) {
    case 'text':
      hash.update('text\0').update(payload.text, 'utf8');
      break;
    case 'rich_text':
      hash.update('text\0').update(payload.plainText, 'utf8');
      break;
    case 'image':
      hash.update('image\0').update(payload.data);
      break;
    case 'file_list':
      hash.update('files\0').update(payload.paths.map(normalizePath).join('\n'), 'utf8');
      break;
  }
  return hash.digest('hex');
}

/**
 * Canonical form used for hashing: trimmed, forward slashes, no trailing
 * separator (except for a bare root such as `/` or `C:/`).
 */
export function normalizePath(p: string): string {
  const forward = p.trim().replace(/\\/g, '/');
  if (/^([a-zA-Z]:)?\/$/.test(forward)) return forward;
  return forward.replace(/\/+$/, '');
}

/**
 * Cheap change marker for the monitor loop. Uses the OS sequence number when
 * the source exposes one, otherwise hashes every representation.
 */
export function snapshotMarker(snapshot: ClipboardSnapshot): string {
  if (snapshot.sequence !== undefined) return `seq:${snapshot.sequence}`;

  const hash = createHash('sha256');
  hash.update(`t\0${snapshot.text ?? ''}\0h\0${snapshot.html ?? ''}\0r\0${snapshot.rtf ?? ''}\0f\0`);
  hash.update((snapshot.files ?? []).join('\n'));
  if (snapshot.image) hash.update('\0i\0').update(snapshot.image.data);
  return `hash:${hash.digest('hex')}`;
}

// ─── Text helpers ───

/** Plain text of a payload, or null for kinds without one */
export function plainTextOf(payload: ClipPayload): string | null {
  switch (payload.kind) {
    case 'text':
      return payload.text;
    case 'rich_text':
      return payload.plainText;
    default:
      return null;
  }
}

export function stripHtml(html: string): string {
  return html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h[1-6]|tr)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/\n{2,}/g, '\n')
    .trim();
}

export function stripRtf(rtf: string): string {
  return rtf
    .replace(/\{\\\*[^{}]*\}/g, '')
    .replace(/\{\\(fonttbl|colortbl|stylesheet)[^{}]*(\{[^{}]*\}[^{}]*)*\}/g, '')
    .replace(/\\'([0-9a-fA-F]{2})/g, (_m, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/\\(par|line)\b ?/g, '\n')
    .replace(/\\tab\b ?/g, '\t')
    .replace(/\\[a-zA-Z]+-?\d* ?/g, '')
    .replace(/\\([{}\\])/g, '$1')
    .replace(/[{}]/g, '')
    .trim();
}

// ─── Preview ───

export function buildPreview(payload: ClipPayload, maxLength: number = DEFAULT_PREVIEW_LENGTH): string {
  switch (payload.kind) {
    case 'text':
      return truncate(payload.text.replace(/\s+/g, ' ').trim(), maxLength);
    case 'rich_text':
      return truncate(payload.plainText.replace(/\s+/g, ' ').trim(), maxLength);
    case 'image':
      return payload.width && payload.height
        ? `Image (${payload.width}x${payload.height}, ${payload.mimeType})`
        : `Image (${payload.mimeType}, ${payload.data.length} bytes)`;
    case 'file_list': {
      const names = payload.paths.map(fileNameOf);
      if (names.length === 1) return truncate(`File: ${names[0]}`, maxLength);
      return truncate(`${names.length} files: ${names.join(', ')}`, maxLength);
    }
  }
}

/** Last path component, whichever separator the platform used */
export function fileNameOf(p: string): string {
  const normalized = normalizePath(p);
  return path.posix.basename(normalized) || normalized;
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

// ─── Images ───

/** Width/height from a PNG IHDR chunk; null for anything else */
export function readPngSize(data: Buffer): { width: number; height: number } | null {
  if (data.length < 24 || !data.subarray(0, 8).equals(PNG_SIGNATURE)) return null;
  if (data.toString('ascii', 12, 16) !== 'IHDR') return null;
  return { width: data.readUInt32BE(16), height: data.readUInt32BE(20) };
}
