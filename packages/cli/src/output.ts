/**
 * Console Output
 *
 * Turns sync notifications into one line each on stdout, and prints the run
 * summary.
 */

import {
  type ActionRecord,
  type ErrorRecord,
  type ProgressRecord,
  type RunStatistics,
  type SyncObserver,
  displayName,
  errorMessage,
} from '@strata/core'

export type WriteLine = (line: string) => void

const SIZE_SUFFIXES = ['B', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB']

/**
 * Size in whole units of 1024.
 * @example formatFileSize(1536) // '1 KB'
 */
export function formatFileSize(bytes: number): string {
  let value = bytes
  let suffix = 0
  while (value >= 1024 && suffix < SIZE_SUFFIXES.length - 1) {
    value = Math.floor(value / 1024)
    suffix++
  }
  return `${value} ${SIZE_SUFFIXES[suffix]}`
}

export function formatAction(record: ActionRecord): string {
  const items = `<${displayName(record.source)}> -> <${displayName(record.target)}>`
  // Existence alone decided: no method to show
  if (record.method === 'name') {
    return `${record.action}: ${items}`
  }
  return `${record.action} (${record.method}): ${items}`
}

export function formatError(record: ErrorRecord): string {
  if (record.exhausted) {
    return `Error: ${errorMessage(record.error)}`
  }
  return `Retry (${record.attempt}): ${errorMessage(record.error)}`
}

export function formatProgress(record: ProgressRecord): string {
  const percent = record.length === 0 ? 100 : (record.bytesCopied / record.length) * 100
  return `Copying (${percent.toFixed(1)}% - ${formatFileSize(record.bytesCopied)}/${formatFileSize(record.length)}): <${displayName(record.source)}> -> <${displayName(record.target)}>`
}

export function formatSummary(statistics: RunStatistics): string[] {
  return [
    `Directories: ${statistics.directories}`,
    `  Created: ${statistics.directoriesCreated}`,
    `  Deleted: ${statistics.directoriesDeleted}`,
    `Files: ${statistics.files}`,
    `  Created: ${statistics.filesCreated}`,
    `  Updated: ${statistics.filesUpdated}`,
    `  Deleted: ${statistics.filesDeleted}`,
    `Copied: ${formatFileSize(statistics.bytesCopied)}`,
  ]
}

export interface ConsoleObserverOptions {
  /** @default console.log */
  write?: WriteLine

  /**
   * Print a line per copied chunk.
   * @default true
   */
  progress?: boolean
}

export function createConsoleObserver(options: ConsoleObserverOptions = {}): SyncObserver {
  const write = options.write ?? console.log
  const observer: SyncObserver = {
    onAction: (record) => write(formatAction(record)),
    onError: (record) => write(formatError(record)),
  }
  if (options.progress ?? true) {
    observer.onProgress = (record) => write(formatProgress(record))
  }
  return observer
}
