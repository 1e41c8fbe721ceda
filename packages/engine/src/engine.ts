/**
 * Sync Engine
 *
 * Walks a source and a target directory tree in lock-step and applies the
 * create/update/delete operations the policy allows. Every storage call runs
 * through the RetryController. Decisions, failures and copy progress are
 * reported synchronously to the caller's observer.
 *
 * Siblings are processed one at a time, in source listing order followed by
 * target-only items in target listing order.
 */

import { Readable } from 'node:stream'
import {
  type ActionRecord,
  DEFAULT_SYNC_POLICY,
  type DirectoryItem,
  type ErrorRecord,
  type FileItem,
  type RunResult,
  type RunStatistics,
  type StorageItem,
  SyncCancelledError,
  type SyncObserver,
  type SyncOptions,
  type SyncPolicy,
  createRunStatistics,
  displayName,
  errorMessage,
  isCancellation,
  throwIfCancelled,
} from '@strata/core'
import pino, { type Logger } from 'pino'
import { EqualityEvaluator } from './equality'
import { type RetryContext, RetryController } from './retry'

/**
 * Options for a single run.
 */
export interface RunOptions {
  /** Cooperative cancellation, checked before every storage call. */
  signal?: AbortSignal
  observer?: SyncObserver
}

/**
 * Raised once an exhausted failure has been reported and not ignored.
 * Outer levels rethrow it without reporting it again.
 */
class RunFailure extends Error {
  constructor(readonly error: unknown) {
    super(errorMessage(error), { cause: error })
    this.name = 'RunFailure'
  }
}

export class SyncEngine {
  readonly policy: Readonly<SyncPolicy>
  readonly evaluator: EqualityEvaluator
  private _log: Logger

  constructor(options: SyncOptions = {}, logger?: Logger) {
    this.policy = Object.freeze({ ...DEFAULT_SYNC_POLICY, ...options.policy })
    if (!Number.isInteger(this.policy.retryCount) || this.policy.retryCount < 0) {
      throw new RangeError(`retryCount must be a non-negative integer, got ${this.policy.retryCount}`)
    }
    this.evaluator = new EqualityEvaluator(options.equalityMethods)
    this._log = (logger ?? pino({ level: 'silent' })).child({ component: 'SyncEngine' })
  }

  /**
   * Synchronize `targetRoot` with `sourceRoot`.
   * Never throws: failures and cancellations are reported in the result,
   * together with the statistics accumulated so far.
   */
  async run(sourceRoot: DirectoryItem, targetRoot: DirectoryItem, options: RunOptions = {}): Promise<RunResult> {
    const run = new SyncRun(this.policy, this.evaluator, options, this._log)
    const startTime = Date.now()
    const result = await run.execute(sourceRoot, targetRoot)

    this._log.info(
      { status: result.status, durationMs: Date.now() - startTime, ...result.statistics },
      `Run ${result.status}: <${displayName(sourceRoot)}> -> <${displayName(targetRoot)}>`,
    )
    return result
  }
}

/**
 * State of one run. Not shared between runs.
 */
class SyncRun {
  private readonly statistics: RunStatistics = createRunStatistics()
  private readonly retry: RetryController
  private readonly signal?: AbortSignal
  private readonly observer: SyncObserver

  constructor(
    private readonly policy: Readonly<SyncPolicy>,
    private readonly evaluator: EqualityEvaluator,
    options: RunOptions,
    private readonly log: Logger,
  ) {
    this.signal = options.signal
    this.observer = options.observer ?? {}
    this.retry = new RetryController({
      retryCount: policy.retryCount,
      onError: (record) => this.observer.onError?.(record),
    })
  }

  async execute(sourceRoot: DirectoryItem, targetRoot: DirectoryItem): Promise<RunResult> {
    try {
      await this.guard({ source: sourceRoot, target: targetRoot }, () =>
        this.syncDirectory(sourceRoot, targetRoot),
      )
      return { status: 'completed', statistics: this.snapshot() }
    } catch (err) {
      if (isCancellation(err)) {
        return { status: 'cancelled', statistics: this.snapshot(), error: err }
      }
      const error = err instanceof RunFailure ? err.error : err
      return { status: 'failed', statistics: this.snapshot(), error }
    }
  }

  private snapshot(): RunStatistics {
    return { ...this.statistics }
  }

  // ---------------------------------------------------------------------------
  // Directory walk
  // ---------------------------------------------------------------------------

  private async syncDirectory(source: DirectoryItem, target: DirectoryItem): Promise<void> {
    throwIfCancelled(this.signal)
    this.log.debug({ source: displayName(source), target: displayName(target) }, 'Syncing directory')

    const sourceChildren = await this.invoke(() => source.listChildren(this.signal), { source })
    const targetChildren = await this.invoke(() => target.listChildren(this.signal), { target })

    const targetByName = new Map<string, StorageItem>()
    for (const child of targetChildren) {
      targetByName.set(child.name, child)
    }

    const sourceNames = new Set<string>()
    for (const sourceChild of sourceChildren) {
      sourceNames.add(sourceChild.name)
      if (sourceChild.kind === 'directory') {
        this.statistics.directories++
      } else {
        this.statistics.files++
      }

      const targetChild = targetByName.get(sourceChild.name)
      await this.guard({ source: sourceChild, target: targetChild ?? target }, () =>
        this.syncPair(sourceChild, targetChild, target),
      )
    }

    for (const targetChild of targetChildren) {
      if (sourceNames.has(targetChild.name)) continue
      await this.guard({ target: targetChild }, async () => {
        await this.deleteItem(targetChild)
      })
    }
  }

  private async syncPair(
    source: StorageItem,
    target: StorageItem | undefined,
    targetParent: DirectoryItem,
  ): Promise<void> {
    throwIfCancelled(this.signal)

    if (!target) {
      await this.createItem(source, targetParent)
      return
    }

    if (source.kind === 'directory' && target.kind === 'directory') {
      await this.syncDirectory(source, target)
      return
    }

    if (source.kind === 'file' && target.kind === 'file') {
      await this.syncFile(source, target, targetParent)
      return
    }

    // Same name, different kind: replace the target when both steps are allowed
    const removed = await this.deleteItem(target)
    if (!removed) {
      this.emit({ action: 'skip', method: 'name', source, target })
      return
    }
    await this.createItem(source, targetParent)
  }

  private async createItem(source: StorageItem, targetParent: DirectoryItem): Promise<void> {
    if (source.kind === 'directory') {
      if (!this.policy.createDirectories) {
        this.emit({ action: 'skip', method: 'name', source })
        return
      }
      const created = await this.invoke(() => targetParent.createDirectory(source.name, this.signal), {
        source,
        target: targetParent,
      })
      this.statistics.directoriesCreated++
      this.emit({ action: 'create', method: 'name', source, target: created })
      await this.syncDirectory(source, created)
      return
    }

    if (!this.policy.createFiles) {
      this.emit({ action: 'skip', method: 'name', source })
      return
    }
    const created = await this.copyFile(source, targetParent, targetParent)
    this.statistics.filesCreated++
    this.emit({ action: 'create', method: 'name', source, target: created })
  }

  private async syncFile(source: FileItem, target: FileItem, targetParent: DirectoryItem): Promise<void> {
    const result = await this.invoke(() => this.evaluator.evaluate(source, target, this.signal), {
      source,
      target,
    })

    if (result.equal || !this.policy.updateFiles) {
      this.emit({ action: 'skip', method: result.method, source, target })
      return
    }

    // createFile replaces the existing file, so a failed copy keeps the old content
    const updated = await this.copyFile(source, targetParent, target)
    this.statistics.filesUpdated++
    this.emit({ action: 'update', method: result.method, source, target: updated })
  }

  /**
   * Delete a target-only item when the policy allows it.
   * A directory is emptied first so every removed item is counted and
   * reported; it is kept when any child had to be kept.
   *
   * @returns whether the item was removed
   */
  private async deleteItem(target: StorageItem): Promise<boolean> {
    throwIfCancelled(this.signal)

    if (target.kind === 'file') {
      if (!this.policy.deleteFiles) {
        this.emit({ action: 'skip', method: 'name', target })
        return false
      }
      await this.invoke(() => target.delete(this.signal), { target })
      this.statistics.filesDeleted++
      this.emit({ action: 'delete', method: 'name', target })
      return true
    }

    if (!this.policy.deleteDirectories) {
      this.emit({ action: 'skip', method: 'name', target })
      return false
    }

    const children = await this.invoke(() => target.listChildren(this.signal), { target })
    let emptied = true
    for (const child of children) {
      const removed = await this.deleteItem(child)
      emptied = emptied && removed
    }
    if (!emptied) {
      this.emit({ action: 'skip', method: 'name', target })
      return false
    }

    await this.invoke(() => target.delete(this.signal), { target })
    this.statistics.directoriesDeleted++
    this.emit({ action: 'delete', method: 'name', target })
    return true
  }

  // ---------------------------------------------------------------------------
  // Content copy
  // ---------------------------------------------------------------------------

  /**
   * Stream `source` into a new (or replacing) file under `targetParent`,
   * reporting progress. Each attempt re-opens the source.
   */
  private async copyFile(source: FileItem, targetParent: DirectoryItem, target: StorageItem): Promise<FileItem> {
    const created = await this.invoke(
      async () => {
        const content = await source.openRead(this.signal)
        const counted = Readable.from(this.countProgress(content, source, target), { objectMode: false })
        try {
          return await targetParent.createFile(
            source.name,
            counted,
            source.length,
            { modifiedAt: source.modifiedAt },
            this.signal,
          )
        } catch (err) {
          // The backend may give up before draining the stream
          counted.destroy()
          content.destroy()
          throw err
        }
      },
      { source, target },
    )
    this.statistics.bytesCopied += source.length
    return created
  }

  private async *countProgress(
    content: Readable,
    source: FileItem,
    target: StorageItem,
  ): AsyncGenerator<Buffer> {
    let bytesCopied = 0
    for await (const chunk of content) {
      throwIfCancelled(this.signal)
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
      bytesCopied += buffer.length
      this.observer.onProgress?.({ bytesCopied, length: source.length, source, target })
      yield buffer
    }
  }

  // ---------------------------------------------------------------------------
  // Error handling
  // ---------------------------------------------------------------------------

  private invoke<T>(operation: () => Promise<T>, context: RetryContext): Promise<T> {
    return this.retry.invoke(operation, this.signal, context)
  }

  /**
   * Run the processing of one item. A failure that survived every retry is
   * reported once; the observer decides whether the walk goes on.
   */
  private async guard(context: RetryContext, work: () => Promise<void>): Promise<void> {
    try {
      await work()
    } catch (err) {
      if (err instanceof RunFailure || isCancellation(err)) throw err

      const record: ErrorRecord = {
        error: err,
        attempt: this.policy.retryCount + 1,
        exhausted: true,
        cancel: false,
        ignore: false,
        ...context,
      }
      this.observer.onError?.(record)

      if (record.cancel) {
        throw new SyncCancelledError('Cancelled after a failed operation', { cause: err })
      }
      if (!record.ignore) {
        this.log.warn(
          { err, source: displayName(context.source), target: displayName(context.target) },
          'Operation failed after all retries',
        )
        throw new RunFailure(err)
      }
      this.log.warn(
        { err, source: displayName(context.source), target: displayName(context.target) },
        'Operation failed after all retries, item skipped',
      )
    }
  }

  private emit(record: ActionRecord): void {
    this.observer.onAction?.(record)
  }
}

