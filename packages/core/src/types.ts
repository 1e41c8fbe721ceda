/**
 * Core types for the Strata tree synchronizer
 */

import type { FileItem, StorageItem } from './storage'

// =============================================================================
// Equality
// =============================================================================

/**
 * A single strategy for deciding whether a source and target file are interchangeable.
 * - `none`: never equal, every source file is copied again
 * - `length`: byte lengths must match
 * - `modifiedTime`: UTC modification timestamps must match
 * - `content`: SHA-256 digests of both contents must match
 */
export type EqualityMethod = 'none' | 'length' | 'modifiedTime' | 'content'

/**
 * Method reported with a decision. `name` means existence alone decided it.
 */
export type DecisionMethod = EqualityMethod | 'name'

/**
 * Set of configured equality methods. Name matching is always implied.
 */
export type EqualityMethodSet = ReadonlySet<EqualityMethod>

export const EQUALITY_METHODS: readonly EqualityMethod[] = ['none', 'length', 'modifiedTime', 'content']

export const DEFAULT_EQUALITY_METHODS: EqualityMethodSet = new Set<EqualityMethod>([
  'length',
  'modifiedTime',
])

/**
 * Outcome of comparing one source/target pair.
 */
export type EqualityResult =
  | { equal: true; method: DecisionMethod }
  | { equal: false; method: EqualityMethod }

// =============================================================================
// Policy
// =============================================================================

/**
 * Operator policy for one run. Frozen for the run's duration.
 */
export interface SyncPolicy {
  /** @default true */
  createDirectories: boolean

  /** @default false */
  deleteDirectories: boolean

  /** @default true */
  createFiles: boolean

  /** @default true */
  updateFiles: boolean

  /** @default false */
  deleteFiles: boolean

  /**
   * Number of immediate retries after a failed storage operation.
   * @default 3
   */
  retryCount: number
}

export const DEFAULT_SYNC_POLICY: Readonly<SyncPolicy> = Object.freeze({
  createDirectories: true,
  deleteDirectories: false,
  createFiles: true,
  updateFiles: true,
  deleteFiles: false,
  retryCount: 3,
})

/**
 * Options accepted by the sync engine.
 */
export interface SyncOptions {
  policy?: Partial<SyncPolicy>
  equalityMethods?: Iterable<EqualityMethod>
}

// =============================================================================
// Statistics
// =============================================================================

/**
 * Counters accumulated during one run.
 */
export interface RunStatistics {
  /** Directories visited on the source side. */
  directories: number
  directoriesCreated: number
  directoriesDeleted: number

  /** Files visited on the source side. */
  files: number
  filesCreated: number
  filesUpdated: number
  filesDeleted: number

  /** Plaintext bytes written to the target. */
  bytesCopied: number
}

export function createRunStatistics(): RunStatistics {
  return {
    directories: 0,
    directoriesCreated: 0,
    directoriesDeleted: 0,
    files: 0,
    filesCreated: 0,
    filesUpdated: 0,
    filesDeleted: 0,
    bytesCopied: 0,
  }
}

/**
 * Terminal state of a run.
 * - `completed`: the whole tree was walked
 * - `cancelled`: the signal was aborted or an observer asked to stop
 * - `failed`: an error survived every retry and was not ignored
 */
export type RunStatus = 'completed' | 'cancelled' | 'failed'

export interface RunResult {
  status: RunStatus

  /** Counters up to the point the run stopped. */
  statistics: RunStatistics

  /** The error that ended a failed or cancelled run. */
  error?: unknown
}

// =============================================================================
// Observer Records
// =============================================================================

export type SyncAction = 'create' | 'update' | 'delete' | 'skip'

/**
 * A decided mutation (or a decision not to mutate).
 */
export interface ActionRecord {
  action: SyncAction

  /** The equality method that triggered the decision. */
  method: DecisionMethod

  source?: StorageItem
  target?: StorageItem
}

/**
 * A failed storage operation.
 * Observers may set `cancel` to stop the run, or `ignore` on an exhausted
 * record to skip the failing item and continue.
 */
export interface ErrorRecord {
  error: unknown

  /**
   * Attempt that failed, starting at 1.
   * @example 2
   */
  attempt: number

  /** True once no retry remains. */
  exhausted: boolean

  cancel: boolean
  ignore: boolean

  source?: StorageItem
  target?: StorageItem
}

/**
 * Progress of a file copy.
 */
export interface ProgressRecord {
  bytesCopied: number
  length: number
  source: FileItem

  /** The file being replaced, or the directory receiving a new file. */
  target: StorageItem
}

/**
 * Observer callbacks, invoked synchronously by the engine.
 */
export interface SyncObserver {
  onAction?(record: ActionRecord): void
  onError?(record: ErrorRecord): void
  onProgress?(record: ProgressRecord): void
}
