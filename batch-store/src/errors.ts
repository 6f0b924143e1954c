/**
 * Storage errors and the reporting hook used to surface them.
 *
 * The append path never throws to its caller; failures are logged and
 * handed to the injected ErrorReporter instead.
 */

export type StorageErrorCode =
  | 'storage_unable_to_create'
  | 'storage_unable_to_open'
  | 'storage_unable_to_write'
  | 'storage_unable_to_rename'
  | 'storage_unable_to_remove'
  | 'storage_unable_to_close'
  | 'storage_invalid'
  | 'storage_unknown';

export class StorageError extends Error {
  readonly code: StorageErrorCode;
  readonly path?: string;

  constructor(code: StorageErrorCode, message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
    this.code = code;
    this.path = options.path;
  }
}

export interface ErrorReporter {
  reportInternalError(error: Error): void;
}

export const noopErrorReporter: ErrorReporter = {
  reportInternalError: () => {},
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
