/**
 * Transform engine — pure text transforms over history items.
 *
 * Only text and the plain fallback of rich text can be transformed; the caller
 * stores the result as a new item so the original capture is kept.
 */

import { TRANSFORM_OPS, UnsupportedKindError, type ClipItem, type TransformOp } from '@shared/types';

export function upper(text: string): string {
  return text.toUpperCase();
}

export function lower(text: string): string {
  return text.toLowerCase();
}

/** First letter of each run of letters upper-cased, the rest lower-cased */
export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, sep: string, first: string) => sep + first.toUpperCase());
}

export function trim(text: string): string {
  return text.trim();
}

/** Join with newlines, keeping input order */
export function merge(texts: readonly string[]): string {
  return texts.join('\n');
}

const TRANSFORMS: Record<TransformOp, (text: string) => string> = {
  upper,
  lower,
  title_case: titleCase,
  trim,
};

export function applyTransform(op: TransformOp, text: string): string {
  return TRANSFORMS[op](text);
}

export function isTransformOp(value: unknown): value is TransformOp {
  return TRANSFORM_OPS.some((op) => op === value);
}

/**
 * Text a transform operates on. Throws UnsupportedKindError for images and file lists.
 */
export function textOf(item: Pick<ClipItem, 'payload'>, operation = 'transform'): string {
  const { payload } = item;
  switch (payload.kind) {
    case 'text':
      return payload.text;
    case 'rich_text':
      return payload.plainText;
    default:
      throw new UnsupportedKindError(payload.kind, operation);
  }
}
