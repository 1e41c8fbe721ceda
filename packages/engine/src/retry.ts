/**
 * Retry Controller
 *
 * Runs a storage operation, retrying it immediately on failure up to a fixed
 * bound. Each retried failure is reported to an observer, which may cancel.
 * Pacing between attempts is left to the observer.
 */

import {
  type ErrorRecord,
  type StorageItem,
  SyncCancelledError,
  isCancellation,
  throwIfCancelled,
} from '@strata/core'

/**
 * Configuration for the RetryController.
 */
export interface RetryControllerConfig {
  /**
   * Retries allowed after the first attempt.
   * @default 3
   */
  retryCount?: number

  /**
   * Called for every failure that will be retried.
   */
  onError?: (record: ErrorRecord) => void
}

/**
 * Items an operation works on, copied into error records.
 */
export interface RetryContext {
  source?: StorageItem
  target?: StorageItem
}

export class RetryController {
  readonly retryCount: number
  private readonly onError?: (record: ErrorRecord) => void

  constructor(config: RetryControllerConfig = {}) {
    const retryCount = config.retryCount ?? 3
    if (!Number.isInteger(retryCount) || retryCount < 0) {
      throw new RangeError(`retryCount must be a non-negative integer, got ${retryCount}`)
    }
    this.retryCount = retryCount
    this.onError = config.onError
  }

  /**
   * Invoke `operation` until it succeeds or the retry bound is reached.
   *
   * @throws SyncCancelledError when the signal is aborted or the observer cancels
   * @throws the last error once every retry failed
   */
  async invoke<T>(
    operation: (attempt: number) => Promise<T>,
    signal?: AbortSignal,
    context: RetryContext = {},
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      throwIfCancelled(signal)
      try {
        return await operation(attempt)
      } catch (err) {
        if (isCancellation(err)) throw err
        // A failure caused by an abort mid-operation is a cancellation
        throwIfCancelled(signal)
        if (attempt > this.retryCount) throw err

        const record: ErrorRecord = {
          error: err,
          attempt,
          exhausted: false,
          cancel: false,
          ignore: false,
          ...context,
        }
        this.onError?.(record)
        if (record.cancel) {
          throw new SyncCancelledError('Cancelled after a failed operation', { cause: err })
        }
      }
    }
  }
}
