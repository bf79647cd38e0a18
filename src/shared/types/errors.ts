/**
 * Structured error types for clipkeep.
 *
 * ClipError carries an error code, a recoverability flag and optional context
 * so callers can decide between skipping an operation and surfacing it.
 */

// ─── Error Codes ───

export enum ErrorCode {
  // Clipboard access
  READ_FAILURE = 'READ_FAILURE',

  // Storage
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  STORAGE_CORRUPT = 'STORAGE_CORRUPT',
  STORAGE_CONSTRAINT = 'STORAGE_CONSTRAINT',

  // History operations
  NOT_FOUND = 'NOT_FOUND',
  UNSUPPORTED_KIND = 'UNSUPPORTED_KIND',

  // Inbound triggers / config
  INVALID_PARAMS = 'INVALID_PARAMS',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

// ─── ClipError ───

export class ClipError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** Can the caller carry on without restarting */
  public readonly recoverable: boolean;
  /** Additional structured context */
  public readonly context?: Record<string, unknown>;
  /** Original error that caused this one */
  public readonly originalError?: Error;
  /** ISO timestamp of when the error occurred */
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      recoverable?: boolean;
      context?: Record<string, unknown>;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'ClipError';
    this.code = code;
    this.recoverable = options.recoverable ?? true;
    this.context = options.context;
    this.originalError = options.originalError;
    this.timestamp = new Date().toISOString();

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  /** Serialize for logging or transport to the UI */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp,
    };
  }

  /** Wrap any thrown value into a ClipError */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, context?: Record<string, unknown>): ClipError {
    if (error instanceof ClipError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ClipError(originalError.message, code, { originalError, context });
  }
}

// ─── Specialised errors ───

/** Clipboard could not be read this tick (locked, timed out, tool missing) */
export class ReadFailureError extends ClipError {
  constructor(message: string, originalError?: Error) {
    super(message, ErrorCode.READ_FAILURE, { originalError });
    this.name = 'ReadFailureError';
  }
}

export type StorageErrorKind = 'unavailable' | 'corrupt' | 'constraint_violation';

const STORAGE_CODES: Record<StorageErrorKind, ErrorCode> = {
  unavailable: ErrorCode.STORAGE_UNAVAILABLE,
  corrupt: ErrorCode.STORAGE_CORRUPT,
  constraint_violation: ErrorCode.STORAGE_CONSTRAINT,
};

export class StorageError extends ClipError {
  public readonly kind: StorageErrorKind;

  constructor(kind: StorageErrorKind, message: string, options: { originalError?: Error; context?: Record<string, unknown> } = {}) {
    super(message, STORAGE_CODES[kind], {
      ...options,
      recoverable: kind === 'constraint_violation',
    });
    this.name = 'StorageError';
    this.kind = kind;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind };
  }
}

export class NotFoundError extends ClipError {
  public readonly id: number;

  constructor(id: number) {
    super(`History item ${id} not found`, ErrorCode.NOT_FOUND, { context: { id } });
    this.name = 'NotFoundError';
    this.id = id;
  }
}

export class UnsupportedKindError extends ClipError {
  constructor(kind: string, operation: string) {
    super(`Cannot ${operation} a ${kind} item`, ErrorCode.UNSUPPORTED_KIND, { context: { kind, operation } });
    this.name = 'UnsupportedKindError';
  }
}

export class InvalidParamsError extends ClipError {
  constructor(operation: string, issues: Array<{ message: string }>) {
    super(`Invalid parameters for ${operation}: ${issues.map((i) => i.message).join('; ')}`, ErrorCode.INVALID_PARAMS, {
      context: { operation, issues },
    });
    this.name = 'InvalidParamsError';
  }
}
