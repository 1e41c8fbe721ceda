/**
 * S3 Storage
 *
 * Implements StorageBackend over an S3 bucket (or any S3-compatible store).
 * Directories are key prefixes ending in `/`, listed with a `/` delimiter.
 * An empty directory is kept alive by a zero-byte marker object named after
 * the prefix itself.
 */

import { Readable } from 'node:stream'
import {
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3'
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

/** Object metadata key holding the source modification time (epoch ms). */
export const MTIME_METADATA_KEY = 'mtime'

const EPOCH = new Date(0)

/** DeleteObjects accepts at most this many keys per request. */
const DELETE_BATCH_SIZE = 1000

export interface S3StorageConfig {
  /**
   * Bucket holding the tree.
   * @example 'backups'
   */
  bucket: string

  /**
   * @default 'us-east-1'
   */
  region?: string

  /**
   * Endpoint for S3-compatible stores.
   * @example 'http://localhost:9000'
   */
  endpoint?: string

  /**
   * Static credentials. The SDK's default provider chain is used when omitted.
   */
  accessKeyId?: string
  secretAccessKey?: string

  /**
   * Address the bucket in the path rather than the host name.
   * @default false
   */
  forcePathStyle?: boolean

  /**
   * Read each file's stored modification time with a HeadObject request while
   * listing. Without it files report the time they were uploaded.
   * @default true
   */
  trackModifiedTime?: boolean

  logger?: Logger
}

/**
 * Normalize a root path to a key prefix: no leading slash, trailing slash
 * unless empty.
 */
export function toPrefix(path: string): string {
  const trimmed = path.replace(/^\/+|\/+$/g, '')
  return trimmed ? `${trimmed}/` : ''
}

export class S3Storage implements StorageBackend {
  readonly name = 's3'
  readonly capabilities: StorageCapabilities = { login: true, fullPath: true }
  readonly bucket: string
  readonly trackModifiedTime: boolean

  /** @internal */
  client: S3Client
  /** @internal */
  readonly log: Logger

  constructor(config: S3StorageConfig) {
    this.bucket = config.bucket
    this.trackModifiedTime = config.trackModifiedTime ?? true
    this.log = (config.logger ?? pino({ level: 'silent' })).child({ component: 'S3Storage', bucket: config.bucket })

    this.client = new S3Client({
      region: config.region ?? 'us-east-1',
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle ?? false,
      credentials:
        config.accessKeyId && config.secretAccessKey
          ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
          : undefined,
    })
  }

  /**
   * Check that the bucket exists and the credentials may access it.
   */
  async logIn(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal)
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }), { abortSignal: signal })
    } catch (err) {
      throw toBackendError(err, 'login', this.uri(''))
    }
    this.log.debug('Bucket reachable')
  }

  /**
   * Resolve a prefix, writing its marker object when nothing exists under it.
   */
  async getRoot(path: string, signal?: AbortSignal): Promise<DirectoryItem> {
    throwIfCancelled(signal)
    const prefix = toPrefix(path)
    if (prefix) {
      try {
        const existing = await this.client.send(
          new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, MaxKeys: 1 }),
          { abortSignal: signal },
        )
        if (!existing.KeyCount) {
          await this.client.send(new PutObjectCommand({ Bucket: this.bucket, Key: prefix, Body: '' }), {
            abortSignal: signal,
          })
        }
      } catch (err) {
        throw toBackendError(err, 'getRoot', this.uri(prefix))
      }
    }
    const segments = prefix.split('/').filter((s) => s.length > 0)
    return new S3Directory(this, prefix, segments[segments.length - 1] ?? '', EPOCH)
  }

  /** @internal */
  uri(key: string): string {
    return `s3://${this.bucket}/${key}`
  }
}

class S3File implements FileItem {
  readonly kind = 'file'
  exists = true

  constructor(
    private readonly storage: S3Storage,
    private readonly key: string,
    readonly name: string,
    readonly length: number,
    readonly createdAt: Date,
    readonly modifiedAt: Date,
  ) {}

  get fullName(): string {
    return this.storage.uri(this.key)
  }

  async openRead(signal?: AbortSignal): Promise<Readable> {
    throwIfCancelled(signal)
    try {
      const response = await this.storage.client.send(
        new GetObjectCommand({ Bucket: this.storage.bucket, Key: this.key }),
        { abortSignal: signal },
      )
      if (!(response.Body instanceof Readable)) {
        throw new BackendError('Response body is not a stream', 'read', this.fullName)
      }
      return response.Body
    } catch (err) {
      throw toBackendError(err, 'read', this.fullName)
    }
  }

  async delete(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal)
    try {
      await this.storage.client.send(new DeleteObjectCommand({ Bucket: this.storage.bucket, Key: this.key }), {
        abortSignal: signal,
      })
    } catch (err) {
      throw toBackendError(err, 'delete', this.fullName)
    }
    this.exists = false
  }
}

class S3Directory implements DirectoryItem {
  readonly kind = 'directory'
  exists = true

  /**
   * @param prefix key prefix, empty for the bucket root or ending in `/`
   */
  constructor(
    private readonly storage: S3Storage,
    private readonly prefix: string,
    readonly name: string,
    readonly modifiedAt: Date,
  ) {}

  get createdAt(): Date {
    return this.modifiedAt
  }

  get fullName(): string {
    return this.storage.uri(this.prefix)
  }

  async listChildren(signal?: AbortSignal): Promise<StorageItem[]> {
    throwIfCancelled(signal)
    const { client, bucket } = this.storage
    const children: StorageItem[] = []

    try {
      let continuationToken: string | undefined
      do {
        const page = await client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: this.prefix,
            Delimiter: '/',
            ContinuationToken: continuationToken,
          }),
          { abortSignal: signal },
        )

        for (const common of page.CommonPrefixes ?? []) {
          if (!common.Prefix) continue
          const name = common.Prefix.slice(this.prefix.length, -1)
          children.push(new S3Directory(this.storage, common.Prefix, name, EPOCH))
        }

        for (const object of page.Contents ?? []) {
          // The marker of this directory lists under its own prefix
          if (!object.Key || object.Key === this.prefix) continue
          const name = object.Key.slice(this.prefix.length)
          const uploadedAt = object.LastModified ?? EPOCH
          const modifiedAt = this.storage.trackModifiedTime
            ? await this.storedModifiedTime(object.Key, signal)
            : undefined
          children.push(
            new S3File(this.storage, object.Key, name, object.Size ?? 0, uploadedAt, modifiedAt ?? uploadedAt),
          )
        }

        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined
      } while (continuationToken)
    } catch (err) {
      throw toBackendError(err, 'list', this.fullName)
    }

    return children
  }

  async createFile(
    name: string,
    content: Readable,
    length: number,
    options?: CreateFileOptions,
    signal?: AbortSignal,
  ): Promise<FileItem> {
    throwIfCancelled(signal)
    const key = `${this.prefix}${name}`
    const modifiedAt = options?.modifiedAt

    try {
      await this.storage.client.send(
        new PutObjectCommand({
          Bucket: this.storage.bucket,
          Key: key,
          Body: content,
          ContentLength: length,
          Metadata: modifiedAt ? { [MTIME_METADATA_KEY]: String(modifiedAt.getTime()) } : undefined,
        }),
        { abortSignal: signal },
      )
    } catch (err) {
      throw toBackendError(err, 'createFile', this.storage.uri(key))
    }

    this.storage.log.debug({ key, length }, 'Object uploaded')
    const now = new Date()
    return new S3File(this.storage, key, name, length, now, modifiedAt ?? now)
  }

  async createDirectory(name: string, signal?: AbortSignal): Promise<DirectoryItem> {
    throwIfCancelled(signal)
    const prefix = `${this.prefix}${name}/`
    try {
      await this.storage.client.send(new PutObjectCommand({ Bucket: this.storage.bucket, Key: prefix, Body: '' }), {
        abortSignal: signal,
      })
    } catch (err) {
      throw toBackendError(err, 'createDirectory', this.storage.uri(prefix))
    }
    return new S3Directory(this.storage, prefix, name, new Date())
  }

  /**
   * Delete every object under the prefix, marker included.
   */
  async delete(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal)
    const { client, bucket } = this.storage

    try {
      const keys: string[] = []
      let continuationToken: string | undefined
      do {
        const page = await client.send(
          new ListObjectsV2Command({ Bucket: bucket, Prefix: this.prefix, ContinuationToken: continuationToken }),
          { abortSignal: signal },
        )
        for (const object of page.Contents ?? []) {
          if (object.Key) keys.push(object.Key)
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined
      } while (continuationToken)

      for (let offset = 0; offset < keys.length; offset += DELETE_BATCH_SIZE) {
        const batch = keys.slice(offset, offset + DELETE_BATCH_SIZE)
        const response = await client.send(
          new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
          }),
          { abortSignal: signal },
        )
        const failed = response.Errors ?? []
        if (failed.length > 0) {
          throw new BackendError(
            `Failed to delete ${failed.length} object(s), first: ${failed[0].Key} (${failed[0].Code})`,
            'delete',
            this.fullName,
          )
        }
      }
    } catch (err) {
      throw toBackendError(err, 'delete', this.fullName)
    }

    this.exists = false
    this.storage.log.debug({ prefix: this.prefix }, 'Prefix deleted')
  }

  private async storedModifiedTime(key: string, signal?: AbortSignal): Promise<Date | undefined> {
    const head = await this.storage.client.send(new HeadObjectCommand({ Bucket: this.storage.bucket, Key: key }), {
      abortSignal: signal,
    })
    const raw = head.Metadata?.[MTIME_METADATA_KEY]
    if (raw === undefined) return undefined
    const ms = Number(raw)
    return Number.isFinite(ms) ? new Date(ms) : undefined
  }
}
