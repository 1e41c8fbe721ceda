/**
 * Domain Error Types
 *
 * Storage failures are wrapped in BackendError so the engine can retry them
 * without knowing which backend raised them.
 */

/**
 * Storage operation that failed.
 * @example 'list'
 */
export type StorageOperation =
  | 'login'
  | 'list'
  | 'createFile'
  | 'createDirectory'
  | 'delete'
  | 'read'
  | 'getRoot'

export class BackendError extends Error {
  constructor(
    message: string,
    public readonly operation: StorageOperation,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'BackendError'
  }
}

/**
 * Name decryption failure, integrity check failure or unsupported scheme version.
 */
export class EncryptionError extends BackendError {
  constructor(message: string, operation: StorageOperation, path?: string, options?: { cause?: unknown }) {
    super(message, operation, path, options)
    this.name = 'EncryptionError'
  }
}

/**
 * Cooperative stop. Not a failure.
 */
export class SyncCancelledError extends Error {
  constructor(message = 'Operation was cancelled', options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SyncCancelledError'
  }
}

export function isBackendError(err: unknown): err is BackendError {
  return err instanceof BackendError
}

/**
 * True for SyncCancelledError and the AbortError raised by aborted signals.
 */
export function isCancellation(err: unknown): boolean {
  if (err instanceof SyncCancelledError) return true
  return err instanceof Error && err.name === 'AbortError'
}

/**
 * Throw SyncCancelledError when the signal has been aborted.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new SyncCancelledError('Operation was cancelled', { cause: signal.reason })
  }
}

/**
 * Wrap any thrown value in a BackendError, keeping existing ones and cancellations as they are.
 */
export function toBackendError(
  err: unknown,
  operation: StorageOperation,
  path?: string,
): unknown {
  if (err instanceof BackendError || isCancellation(err)) {
    return err
  }
  const message = err instanceof Error ? err.message : String(err)
  return new BackendError(`${operation} failed${path ? ` for ${path}` : ''}: ${message}`, operation, path, {
    cause: err,
  })
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
