/**
 * AES Storage Adapter
 *
 * Wraps another StorageBackend so that everything written through it is
 * encrypted and everything read through it is decrypted. File and directory
 * names are encrypted on demand. The root path is passed to the inner
 * backend as given.
 *
 * Adapters compose: the inner backend may itself be an AesStorage.
 */

import { Readable } from 'node:stream'
import {
  type CreateFileOptions,
  type DirectoryItem,
  type FileItem,
  type StorageBackend,
  type StorageCapabilities,
  type StorageItem,
  throwIfCancelled,
} from '@strata/core'
import pino, { type Logger } from 'pino'
import {
  DEFAULT_SCHEME_VERSION,
  type SchemeVersion,
  decryptContent,
  encryptContent,
  encryptedLength,
  plaintextLength,
} from './content'
import { NameCipher } from './names'

export interface AesStorageConfig {
  /**
   * Password the content and name keys are derived from.
   */
  password: string

  /**
   * Content scheme written to new files. Existing files are read with the
   * scheme named in their header.
   * @default 2
   */
  version?: SchemeVersion

  /**
   * @default false
   */
  encryptFileNames?: boolean

  /**
   * @default false
   */
  encryptDirectoryNames?: boolean

  logger?: Logger
}

export class AesStorage implements StorageBackend {
  readonly name: string
  readonly capabilities: StorageCapabilities
  readonly version: SchemeVersion
  readonly encryptFileNames: boolean
  readonly encryptDirectoryNames: boolean

  /** @internal */
  readonly password: string
  /** @internal */
  readonly names: NameCipher
  /** @internal */
  readonly log: Logger

  constructor(
    private readonly inner: StorageBackend,
    config: AesStorageConfig,
  ) {
    if (!config.password) {
      throw new Error('AES password must not be empty')
    }
    this.name = `aes(${inner.name})`
    this.capabilities = inner.capabilities
    this.password = config.password
    this.version = config.version ?? DEFAULT_SCHEME_VERSION
    this.encryptFileNames = config.encryptFileNames ?? false
    this.encryptDirectoryNames = config.encryptDirectoryNames ?? false
    this.names = new NameCipher(config.password)
    this.log = (config.logger ?? pino({ level: 'silent' })).child({ component: 'AesStorage', inner: inner.name })
  }

  async logIn(signal?: AbortSignal): Promise<void> {
    await this.inner.logIn?.(signal)
  }

  async getRoot(path: string, signal?: AbortSignal): Promise<DirectoryItem> {
    const root = await this.inner.getRoot(path, signal)
    return new AesDirectory(this, root, root.name)
  }

  /** @internal */
  encodeName(kind: StorageItem['kind'], name: string): string {
    const encrypt = kind === 'file' ? this.encryptFileNames : this.encryptDirectoryNames
    return encrypt ? this.names.encrypt(name) : name
  }

  /** @internal */
  decodeName(item: StorageItem): string {
    const encrypted = item.kind === 'file' ? this.encryptFileNames : this.encryptDirectoryNames
    return encrypted ? this.names.decrypt(item.name, item.fullName) : item.name
  }

  /** @internal */
  wrap(item: StorageItem, name = this.decodeName(item)): StorageItem {
    return item.kind === 'file' ? new AesFile(this, item, name) : new AesDirectory(this, item, name)
  }
}

class AesFile implements FileItem {
  readonly kind = 'file'
  readonly length: number

  constructor(
    private readonly storage: AesStorage,
    private readonly inner: FileItem,
    readonly name: string,
  ) {
    this.length = plaintextLength(inner.length, inner.fullName)
  }

  get exists(): boolean {
    return this.inner.exists
  }

  get createdAt(): Date {
    return this.inner.createdAt
  }

  get modifiedAt(): Date {
    return this.inner.modifiedAt
  }

  get fullName(): string | undefined {
    return this.inner.fullName
  }

  async openRead(signal?: AbortSignal): Promise<Readable> {
    throwIfCancelled(signal)
    const content = await this.inner.openRead(signal)
    return Readable.from(
      decryptContent(content, { password: this.storage.password, path: this.inner.fullName }),
      { objectMode: false },
    )
  }

  delete(signal?: AbortSignal): Promise<void> {
    return this.inner.delete(signal)
  }
}

class AesDirectory implements DirectoryItem {
  readonly kind = 'directory'

  constructor(
    private readonly storage: AesStorage,
    private readonly inner: DirectoryItem,
    readonly name: string,
  ) {}

  get exists(): boolean {
    return this.inner.exists
  }

  get createdAt(): Date {
    return this.inner.createdAt
  }

  get modifiedAt(): Date {
    return this.inner.modifiedAt
  }

  get fullName(): string | undefined {
    return this.inner.fullName
  }

  async listChildren(signal?: AbortSignal): Promise<StorageItem[]> {
    const children = await this.inner.listChildren(signal)
    return children.map((child) => this.storage.wrap(child))
  }

  async createFile(
    name: string,
    content: Readable,
    length: number,
    options?: CreateFileOptions,
    signal?: AbortSignal,
  ): Promise<FileItem> {
    throwIfCancelled(signal)
    const encrypted = Readable.from(
      encryptContent(content, {
        password: this.storage.password,
        length,
        version: this.storage.version,
        path: this.fullName,
      }),
      { objectMode: false },
    )
    let created: FileItem
    try {
      created = await this.inner.createFile(
        this.storage.encodeName('file', name),
        encrypted,
        encryptedLength(length),
        options,
        signal,
      )
    } catch (err) {
      encrypted.destroy()
      content.destroy()
      throw err
    }
    this.storage.log.debug({ name, length, version: this.storage.version }, 'Encrypted file written')
    return new AesFile(this.storage, created, name)
  }

  async createDirectory(name: string, signal?: AbortSignal): Promise<DirectoryItem> {
    const created = await this.inner.createDirectory(this.storage.encodeName('directory', name), signal)
    return new AesDirectory(this.storage, created, name)
  }

  delete(signal?: AbortSignal): Promise<void> {
    return this.inner.delete(signal)
  }
}
