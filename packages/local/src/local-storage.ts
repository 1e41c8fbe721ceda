/**
 * Local File System Storage
 *
 * Implements StorageBackend over a directory on the local disk.
 * New files are written to a hidden `.strata-<random>.partial` file in the
 * same directory and renamed into place (replacing any previous file) once
 * the whole stream has been received. The temporary name does not depend on
 * the final one, so names up to the file system limit can be written.
 */

import { randomBytes } from 'node:crypto'
import type { Stats } from 'node:fs'
import { mkdir, open, readdir, rename, rm, stat, utimes } from 'node:fs/promises'
import { basename, join, resolve } from 'node:path'
import type { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import {
  BackendError,
  type CreateFileOptions,
  type DirectoryItem,
  type FileItem,
  type StorageBackend,
  type StorageCapabilities,
  type StorageItem,
  throwIfCancelled,
  toBackendError,
} from '@strata/core'
import pino, { type Logger } from 'pino'

function partialFileName(): string {
  return `.strata-${randomBytes(12).toString('hex')}.partial`
}

export interface LocalStorageConfig {
  /**
   * Base directory that relative root paths are resolved against.
   * @default process.cwd()
   */
  baseDirectory?: string

  logger?: Logger
}

export class LocalStorage implements StorageBackend {
  readonly name = 'fs'
  readonly capabilities: StorageCapabilities = { login: false, fullPath: true }
  private readonly baseDirectory: string
  private _log: Logger

  constructor(config: LocalStorageConfig = {}) {
    this.baseDirectory = config.baseDirectory ?? process.cwd()
    this._log = (config.logger ?? pino({ level: 'silent' })).child({ component: 'LocalStorage' })
  }

  /**
   * Resolve a directory, creating it and any missing parents.
   */
  async getRoot(path: string, signal?: AbortSignal): Promise<DirectoryItem> {
    throwIfCancelled(signal)
    const fullPath = resolve(this.baseDirectory, path)
    let stats: Stats
    try {
      await mkdir(fullPath, { recursive: true })
      stats = await stat(fullPath)
    } catch (err) {
      throw toBackendError(err, 'getRoot', fullPath)
    }
    if (!stats.isDirectory()) {
      throw new BackendError(`Not a directory: ${fullPath}`, 'getRoot', fullPath)
    }
    return new LocalDirectory(fullPath, stats, this._log)
  }
}

abstract class LocalItem {
  protected _exists = true

  constructor(
    readonly fullName: string,
    protected readonly stats: Stats,
    protected readonly log: Logger,
  ) {}

  get name(): string {
    return basename(this.fullName)
  }

  get exists(): boolean {
    return this._exists
  }

  get createdAt(): Date {
    return this.stats.birthtime
  }

  get modifiedAt(): Date {
    return this.stats.mtime
  }

  async delete(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal)
    try {
      await rm(this.fullName, { recursive: true })
    } catch (err) {
      throw toBackendError(err, 'delete', this.fullName)
    }
    this._exists = false
    this.log.debug({ path: this.fullName }, 'Deleted')
  }
}

class LocalFile extends LocalItem implements FileItem {
  readonly kind = 'file'

  get length(): number {
    return this.stats.size
  }

  async openRead(signal?: AbortSignal): Promise<Readable> {
    throwIfCancelled(signal)
    try {
      const handle = await open(this.fullName, 'r')
      return handle.createReadStream()
    } catch (err) {
      throw toBackendError(err, 'read', this.fullName)
    }
  }
}

class LocalDirectory extends LocalItem implements DirectoryItem {
  readonly kind = 'directory'

  async listChildren(signal?: AbortSignal): Promise<StorageItem[]> {
    throwIfCancelled(signal)
    try {
      const entries = await readdir(this.fullName)
      const children: StorageItem[] = []
      for (const entry of entries) {
        const path = join(this.fullName, entry)
        const stats = await stat(path)
        if (stats.isDirectory()) {
          children.push(new LocalDirectory(path, stats, this.log))
        } else if (stats.isFile()) {
          children.push(new LocalFile(path, stats, this.log))
        }
      }
      return children
    } catch (err) {
      throw toBackendError(err, 'list', this.fullName)
    }
  }

  async createFile(
    name: string,
    content: Readable,
    length: number,
    options?: CreateFileOptions,
    signal?: AbortSignal,
  ): Promise<FileItem> {
    throwIfCancelled(signal)
    const finalPath = join(this.fullName, name)
    const tempPath = join(this.fullName, partialFileName())

    try {
      const handle = await open(tempPath, 'wx')
      let written = 0
      await pipeline(
        content,
        async function* (source: AsyncIterable<Buffer>) {
          for await (const chunk of source) {
            written += chunk.length
            yield chunk
          }
        },
        handle.createWriteStream(),
        { signal },
      )
      if (written !== length) {
        throw new BackendError(`Expected ${length} bytes, received ${written}`, 'createFile', finalPath)
      }
      if (options?.modifiedAt) {
        await utimes(tempPath, options.modifiedAt, options.modifiedAt)
      }
      await rename(tempPath, finalPath)
      this.log.debug({ path: finalPath, length }, 'File created')
      return new LocalFile(finalPath, await stat(finalPath), this.log)
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        this.log.warn({ err: cleanupErr, path: tempPath }, 'Failed to remove partial file')
      })
      throw toBackendError(err, 'createFile', finalPath)
    }
  }

  async createDirectory(name: string, signal?: AbortSignal): Promise<DirectoryItem> {
    throwIfCancelled(signal)
    const path = join(this.fullName, name)
    try {
      await mkdir(path)
      return new LocalDirectory(path, await stat(path), this.log)
    } catch (err) {
      throw toBackendError(err, 'createDirectory', path)
    }
  }
}
