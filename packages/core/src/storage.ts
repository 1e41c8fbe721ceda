/**
 * Storage Abstraction
 *
 * Contract implemented by every storage backend:
 * - Local disk (@strata/local)
 * - S3-compatible object stores (@strata/s3)
 * - AES encryption adapter wrapping any other backend (@strata/aes)
 *
 * The sync engine works only with this contract, so a backend can be swapped
 * or wrapped without changing the engine.
 */

import type { Readable } from 'node:stream'

/**
 * Discriminator for the two item variants.
 */
export type ItemKind = 'file' | 'directory'

interface StorageItemBase {
  /**
   * Leaf name, never contains a path separator.
   * @example 'report.pdf'
   */
  readonly name: string

  readonly exists: boolean

  /** Creation time (UTC). */
  readonly createdAt: Date

  /** Last modification time (UTC), at the precision the backend exposes. */
  readonly modifiedAt: Date

  /**
   * Full path for display. Only set when the backend advertises `fullPath`.
   * @example '/home/alice/docs/report.pdf'
   * @example 's3://backups/docs/report.pdf'
   */
  readonly fullName?: string

  /**
   * Delete the item. Directories are removed with their contents.
   */
  delete(signal?: AbortSignal): Promise<void>
}

export interface FileItem extends StorageItemBase {
  readonly kind: 'file'

  /** Content length in bytes. */
  readonly length: number

  /**
   * Open the content for reading.
   */
  openRead(signal?: AbortSignal): Promise<Readable>
}

/**
 * Options for creating a file.
 */
export interface CreateFileOptions {
  /**
   * Modification time to preserve on the new file, when the backend supports it.
   */
  modifiedAt?: Date
}

export interface DirectoryItem extends StorageItemBase {
  readonly kind: 'directory'

  /**
   * List direct children. Order is backend-defined but stable.
   */
  listChildren(signal?: AbortSignal): Promise<StorageItem[]>

  /**
   * Create (or replace) a child file from a stream of known length.
   * The file must not become visible until the content is fully written.
   */
  createFile(
    name: string,
    content: Readable,
    length: number,
    options?: CreateFileOptions,
    signal?: AbortSignal,
  ): Promise<FileItem>

  /**
   * Create a child directory. Calling twice with the same name is backend-defined.
   */
  createDirectory(name: string, signal?: AbortSignal): Promise<DirectoryItem>
}

export type StorageItem = FileItem | DirectoryItem

/**
 * Optional capabilities a backend advertises.
 */
export interface StorageCapabilities {
  /** The backend exposes `logIn` and needs it before first use. */
  login: boolean

  /** Items carry a stable `fullName` for display. */
  fullPath: boolean
}

/**
 * Storage Backend Interface.
 *
 * Implementations:
 * - LocalStorage: node:fs
 * - S3Storage: @aws-sdk/client-s3
 * - AesStorage: wraps another StorageBackend
 */
export interface StorageBackend {
  /**
   * Backend name for logging.
   * @example 'fs'
   * @example 's3'
   */
  readonly name: string

  readonly capabilities: StorageCapabilities

  /**
   * Authenticate against the backend. Only called when `capabilities.login` is set.
   */
  logIn?(signal?: AbortSignal): Promise<void>

  /**
   * Get the directory at `path`, creating it when the backend needs to.
   * @example '/var/backups/photos'
   * @example 'photos/2024'
   */
  getRoot(path: string, signal?: AbortSignal): Promise<DirectoryItem>
}

/**
 * A root directory resolved against its backend.
 */
export interface ResolvedRoot {
  backend: StorageBackend
  directory: DirectoryItem
}

/**
 * Resolve a root directory, logging in first when the backend asks for it.
 */
export async function resolveRoot(
  backend: StorageBackend,
  path: string,
  signal?: AbortSignal,
): Promise<ResolvedRoot> {
  if (backend.capabilities.login && backend.logIn) {
    await backend.logIn(signal)
  }
  const directory = await backend.getRoot(path, signal)
  return { backend, directory }
}

export function isDirectory(item: StorageItem): item is DirectoryItem {
  return item.kind === 'directory'
}

export function isFile(item: StorageItem): item is FileItem {
  return item.kind === 'file'
}

/**
 * Display name for an item: its full path when known, otherwise its leaf name.
 */
export function displayName(item: StorageItem | undefined): string {
  if (!item) return ''
  return item.fullName ?? item.name
}
