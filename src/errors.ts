export type LibraryErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_ID'
  | 'VALIDATION'
  | 'PERSISTENCE_IO'
  | 'FORMAT'
  | 'RECOVERY_EXHAUSTED';

/**
 * Base class for every error the engine surfaces to callers.
 * `code` is stable and safe to switch on; `message` is for humans.
 */
export class LibraryError extends Error {
  readonly code: LibraryErrorCode;

  constructor(code: LibraryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends LibraryError {
  constructor(readonly kind: 'item' | 'task', readonly id: string) {
    super('NOT_FOUND', `${kind === 'item' ? 'Item' : 'Task'} not found: ${id}`);
  }
}

export class DuplicateIdError extends LibraryError {
  constructor(readonly kind: 'item' | 'task', readonly id: string) {
    super('DUPLICATE_ID', `${kind === 'item' ? 'Item' : 'Task'} id already exists: ${id}`);
  }
}

export class ValidationError extends LibraryError {
  constructor(readonly field: string, message: string) {
    super('VALIDATION', `Invalid ${field}: ${message}`);
  }
}

export class PersistenceIOError extends LibraryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_IO', message, options);
  }
}

export class FormatError extends LibraryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FORMAT', message, options);
  }
}

export class RecoveryExhaustedError extends LibraryError {
  readonly causes: Error[];

  constructor(liveCause: Error, backupCauses: Error[]) {
    super(
      'RECOVERY_EXHAUSTED',
      backupCauses.length
        ? `Live file unreadable (${liveCause.message}) and all ${backupCauses.length} backup(s) failed`
        : `Live file unreadable (${liveCause.message}) and no backups available`,
      { cause: liveCause }
    );
    this.causes = [liveCause, ...backupCauses];
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
