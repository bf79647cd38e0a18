/**
 * Shared types — single source of truth for the service core and its consumers.
 *
 * Import from '@shared/types'.
 */

// Clipboard history
export type {
  ClipKind,
  RichTextFormat,
  TextPayload,
  RichTextPayload,
  ImagePayload,
  FileListPayload,
  ClipPayload,
  ClipCandidate,
  ClipItem,
  ClipboardSnapshot,
  HistoryQuery,
  HistoryCounts,
  DeleteReason,
  UpdateReason,
  HistoryEvent,
  HistoryListener,
  TransformOp,
  PastePayload,
  MonitorStatus,
  ClipboardStatus,
} from './clip';
export { TRANSFORM_OPS } from './clip';

// Configuration
export type { ClipkeepConfig, ClipkeepConfigParsed, ConfigKey } from './config';

// Errors
export {
  ErrorCode,
  ClipError,
  ReadFailureError,
  StorageError,
  NotFoundError,
  UnsupportedKindError,
  InvalidParamsError,
} from './errors';
export type { StorageErrorKind } from './errors';
