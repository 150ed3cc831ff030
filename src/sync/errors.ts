/** Base class for every sync failure; `code` is stable across releases. */
export class SyncError extends Error {
  readonly code: string;
  override readonly cause?: Error;

  constructor(message: string, code: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = cause;
  }
}

export type AuthFailureReason =
  | 'no_credentials'
  | 'invalid_credentials'
  | 'network'
  | 'server'
  | 'invalid_response'
  | 'expired';

/** Work completed before a session was aborted. */
export interface SessionProgress {
  syncedCount: number;
  failedCount: number;
  chunks: number;
}

/** No usable session credential. Fatal to the whole session. */
export class AuthenticationError extends SyncError {
  readonly reason: AuthFailureReason;
  readonly progress?: SessionProgress;

  constructor(
    message: string,
    reason: AuthFailureReason,
    options: { cause?: Error; progress?: SessionProgress } = {},
  ) {
    super(message, 'AUTH_FAILED', options.cause);
    this.reason = reason;
    this.progress = options.progress;
  }

  /** Same failure, with the progress of the session it aborted. */
  withProgress(progress: SessionProgress): AuthenticationError {
    return new AuthenticationError(this.message, this.reason, { cause: this.cause, progress });
  }
}

/** One chunk could not be delivered. Recorded in the ledger, never thrown out of a session. */
export class TransferError extends SyncError {
  /** HTTP status when the backend answered; absent for connectivity loss or timeout. */
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: Error } = {}) {
    super(message, 'TRANSFER_FAILED', options.cause);
    this.status = options.status;
  }
}

/** Unexpected failure of the local record store. */
export class LocalStorageError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'LOCAL_STORAGE', cause);
  }
}

/** An attachment file could not be removed. Logged, never fatal. */
export class AttachmentCleanupError extends SyncError {
  readonly path: string;

  constructor(path: string, cause?: Error) {
    super(`Failed to delete attachment ${path}${cause ? `: ${cause.message}` : ''}`, 'ATTACHMENT_CLEANUP', cause);
    this.path = path;
  }
}

/** A conflicting sync operation is already running. */
export class SyncBusyError extends SyncError {
  readonly operation: string;

  constructor(operation: string, heldBy: 'this process' | 'another process') {
    super(`Cannot start ${operation}: a conflicting sync operation is running in ${heldBy}`, 'SYNC_BUSY');
    this.operation = operation;
  }
}

/** Normalize a thrown value to an Error. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
