/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions for creating test data across all packages.
 */

import { Readable } from 'node:stream'
import type {
  ActionRecord,
  ErrorRecord,
  ProgressRecord,
  StorageItem,
  SyncObserver,
} from '@strata/core'
import { faker } from '@faker-js/faker'
import { vi } from 'vitest'

// =============================================================================
// Content
// =============================================================================

export function createContent(length: number): Buffer {
  return Buffer.from(faker.string.alphanumeric(length))
}

export function createBinaryContent(length: number): Buffer {
  return Buffer.from(Array.from({ length }, () => faker.number.int({ min: 0, max: 255 })))
}

export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  }
  return Buffer.concat(chunks)
}

/**
 * Stream a buffer in chunks of `chunkSize` bytes.
 */
export function streamOf(content: Buffer, chunkSize = 7): Readable {
  const chunks: Buffer[] = []
  for (let offset = 0; offset < content.length; offset += chunkSize) {
    chunks.push(content.subarray(offset, offset + chunkSize))
  }
  return Readable.from(chunks)
}

// =============================================================================
// Observer
// =============================================================================

export interface RecordingObserver extends SyncObserver {
  actions: ActionRecord[]
  errors: ErrorRecord[]
  progress: ProgressRecord[]
}

/**
 * Observer that keeps every record. `onError` is a mock so tests can set flags.
 */
export function createRecordingObserver(
  onError?: (record: ErrorRecord) => void,
): RecordingObserver {
  const actions: ActionRecord[] = []
  const errors: ErrorRecord[] = []
  const progress: ProgressRecord[] = []

  return {
    actions,
    errors,
    progress,
    onAction: (record) => {
      actions.push(record)
    },
    onError: vi.fn((record: ErrorRecord) => {
      errors.push(record)
      onError?.(record)
    }),
    onProgress: (record) => {
      progress.push({ ...record })
    },
  }
}

/**
 * `action name` pairs for compact assertions.
 * @example ['create a', 'create x.txt']
 */
export function describeActions(actions: ActionRecord[]): string[] {
  return actions.map((record) => {
    const item: StorageItem | undefined = record.source ?? record.target
    return `${record.action} ${item?.name ?? '?'}`
  })
}
