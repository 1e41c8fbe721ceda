import { Readable } from 'node:stream'
import {
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  type ListObjectsV2CommandInput,
  ListObjectsV2Command,
  PutObjectCommand,
} from '@aws-sdk/client-s3'
import { beforeEach, describe, expect, test } from 'vitest'
import { BackendError, resolveRoot } from '@strata/core'
import { SyncEngine } from '@strata/engine'
import { createContent, readAll, streamOf } from '../../../test/fixtures'
import { MemoryStorage } from '../../../test/memory-storage'
import { S3Storage, type S3StorageConfig, toPrefix } from './s3-storage'

interface FakeObject {
  body: Buffer
  lastModified: Date
  metadata?: Record<string, string>
}

const UPLOADED_AT = new Date('2024-06-01T10:00:00.000Z')

/**
 * In-process S3 stand-in answering the commands S3Storage sends.
 * Listings are paged `pageSize` entries at a time.
 */
class FakeS3 {
  readonly objects = new Map<string, FakeObject>()
  readonly calls: string[] = []

  constructor(
    readonly bucket: string,
    readonly pageSize = 2,
  ) {}

  put(key: string, content: string | Buffer, metadata?: Record<string, string>): void {
    this.objects.set(key, { body: Buffer.from(content), lastModified: UPLOADED_AT, metadata })
  }

  async send(command: unknown): Promise<object> {
    if (command instanceof HeadBucketCommand) {
      this.calls.push('HeadBucket')
      if (command.input.Bucket !== this.bucket) throw new Error('Forbidden')
      return {}
    }
    if (command instanceof ListObjectsV2Command) {
      this.calls.push(`List:${command.input.Prefix ?? ''}`)
      return this.list(command.input)
    }
    if (command instanceof HeadObjectCommand) {
      this.calls.push(`Head:${command.input.Key}`)
      const object = this.objects.get(command.input.Key ?? '')
      if (!object) throw new Error('NotFound')
      return { ContentLength: object.body.length, Metadata: object.metadata ?? {} }
    }
    if (command instanceof GetObjectCommand) {
      this.calls.push(`Get:${command.input.Key}`)
      const object = this.objects.get(command.input.Key ?? '')
      if (!object) throw Object.assign(new Error('The specified key does not exist.'), { name: 'NoSuchKey' })
      return { Body: Readable.from([object.body]) }
    }
    if (command instanceof PutObjectCommand) {
      const { Key, Body, ContentLength, Metadata } = command.input
      this.calls.push(`Put:${Key}`)
      const body = await this.readBody(Body)
      if (ContentLength !== undefined && ContentLength !== body.length) {
        throw new Error(`Content-Length ${ContentLength} does not match body of ${body.length} bytes`)
      }
      this.objects.set(Key ?? '', { body, lastModified: UPLOADED_AT, metadata: Metadata })
      return {}
    }
    if (command instanceof DeleteObjectCommand) {
      this.calls.push(`Delete:${command.input.Key}`)
      this.objects.delete(command.input.Key ?? '')
      return {}
    }
    if (command instanceof DeleteObjectsCommand) {
      const keys = (command.input.Delete?.Objects ?? []).map((o) => o.Key ?? '')
      this.calls.push(`DeleteBatch:${keys.length}`)
      for (const key of keys) this.objects.delete(key)
      return { Errors: [] }
    }
    throw new Error('Unexpected command')
  }

  private list(input: ListObjectsV2CommandInput): object {
    const prefix = input.Prefix ?? ''
    const entries: Array<{ key: string } | { prefix: string }> = []
    const seen = new Set<string>()
    for (const key of [...this.objects.keys()].sort()) {
      if (!key.startsWith(prefix)) continue
      const rest = key.slice(prefix.length)
      const cut = input.Delimiter ? rest.indexOf(input.Delimiter) : -1
      if (cut >= 0) {
        const common = prefix + rest.slice(0, cut + 1)
        if (!seen.has(common)) {
          seen.add(common)
          entries.push({ prefix: common })
        }
      } else {
        entries.push({ key })
      }
    }

    const start = input.ContinuationToken ? Number(input.ContinuationToken) : 0
    const size = Math.min(input.MaxKeys ?? 1000, this.pageSize)
    const page = entries.slice(start, start + size)
    const truncated = start + size < entries.length

    return {
      Contents: page.flatMap((e) => {
        if (!('key' in e)) return []
        const object = this.objects.get(e.key)
        return [{ Key: e.key, Size: object?.body.length, LastModified: object?.lastModified }]
      }),
      CommonPrefixes: page.flatMap((e) => ('prefix' in e ? [{ Prefix: e.prefix }] : [])),
      KeyCount: page.length,
      IsTruncated: truncated,
      NextContinuationToken: truncated ? String(start + size) : undefined,
    }
  }

  private async readBody(body: unknown): Promise<Buffer> {
    if (body instanceof Readable) return readAll(body)
    if (typeof body === 'string') return Buffer.from(body)
    if (body instanceof Uint8Array) return Buffer.from(body)
    throw new Error('Unsupported body')
  }
}

function createStorageWithFakeS3(config: Partial<S3StorageConfig> = {}) {
  const storage = new S3Storage({ bucket: 'test-bucket', ...config })
  const fake = new FakeS3('test-bucket')

  // Replace the internal S3 client with the fake
  ;(storage as unknown as { client: FakeS3 }).client = fake

  return { storage, fake }
}

describe('toPrefix', () => {
  test('normalizes root paths to key prefixes', () => {
    expect(toPrefix('')).toBe('')
    expect(toPrefix('/')).toBe('')
    expect(toPrefix('backups')).toBe('backups/')
    expect(toPrefix('/backups/daily/')).toBe('backups/daily/')
  })
})

describe('S3Storage', () => {
  let storage: S3Storage
  let fake: FakeS3

  beforeEach(() => {
    ;({ storage, fake } = createStorageWithFakeS3())
  })

  describe('logIn', () => {
    test('checks the bucket once when resolving a root', async () => {
      await resolveRoot(storage, '')

      expect(fake.calls.filter((c) => c === 'HeadBucket')).toHaveLength(1)
    })

    test('wraps access failures', async () => {
      const other = createStorageWithFakeS3({ bucket: 'other-bucket' })

      await expect(other.storage.logIn()).rejects.toMatchObject({ name: 'BackendError', operation: 'login' })
    })
  })

  describe('getRoot', () => {
    test('writes a marker for a new prefix', async () => {
      const root = await storage.getRoot('backups/daily')

      expect(root.name).toBe('daily')
      expect(root.fullName).toBe('s3://test-bucket/backups/daily/')
      expect(fake.objects.has('backups/daily/')).toBe(true)
    })

    test('leaves an existing prefix alone', async () => {
      fake.put('backups/x.txt', 'data')

      await storage.getRoot('backups')

      expect(fake.objects.has('backups/')).toBe(false)
    })
  })

  describe('listChildren', () => {
    beforeEach(() => {
      fake.put('a.txt', 'alpha')
      fake.put('b.txt', 'bravo!')
      fake.put('c/d.txt', 'delta')
      fake.put('docs/', '')
      fake.put('docs/readme.md', '# readme')
    })

    test('follows continuation tokens and maps prefixes to directories', async () => {
      const children = await (await storage.getRoot('')).listChildren()

      expect(children.map((c) => [c.name, c.kind])).toEqual([
        ['a.txt', 'file'],
        ['b.txt', 'file'],
        ['c', 'directory'],
        ['docs', 'directory'],
      ])
      expect(fake.calls.filter((c) => c === 'List:')).toHaveLength(2)
    })

    test('excludes the directory marker', async () => {
      const root = await storage.getRoot('')
      const docs = (await root.listChildren()).find((c) => c.name === 'docs')
      if (docs?.kind !== 'directory') throw new Error('expected a directory')

      const children = await docs.listChildren()

      expect(children.map((c) => c.name)).toEqual(['readme.md'])
    })

    test('reads the stored modification time', async () => {
      const modifiedAt = new Date('2023-12-24T18:00:00.000Z')
      fake.put('a.txt', 'alpha', { mtime: String(modifiedAt.getTime()) })

      const [file] = await (await storage.getRoot('')).listChildren()
      if (file?.kind !== 'file') throw new Error('expected a file')

      expect(file.length).toBe(5)
      expect(file.modifiedAt.getTime()).toBe(modifiedAt.getTime())
      expect(file.createdAt.getTime()).toBe(UPLOADED_AT.getTime())
    })

    test('uses the upload time without modification time tracking', async () => {
      ;({ storage, fake } = createStorageWithFakeS3({ trackModifiedTime: false }))
      fake.put('a.txt', 'alpha', { mtime: '0' })

      const [file] = await (await storage.getRoot('')).listChildren()

      expect(file?.modifiedAt.getTime()).toBe(UPLOADED_AT.getTime())
      expect(fake.calls.some((c) => c.startsWith('Head:'))).toBe(false)
    })
  })

  describe('files', () => {
    test('createFile uploads content with its modification time', async () => {
      const content = createContent(30)
      const modifiedAt = new Date('2024-01-02T03:04:05.006Z')
      const root = await storage.getRoot('backups')

      const file = await root.createFile('x.bin', streamOf(content), 30, { modifiedAt })

      expect(file.fullName).toBe('s3://test-bucket/backups/x.bin')
      expect(file.modifiedAt.getTime()).toBe(modifiedAt.getTime())
      expect(fake.objects.get('backups/x.bin')?.body).toEqual(content)
      expect(fake.objects.get('backups/x.bin')?.metadata).toEqual({ mtime: String(modifiedAt.getTime()) })
    })

    test('createFile wraps upload failures', async () => {
      const root = await storage.getRoot('')

      const error = await root.createFile('x.bin', streamOf(createContent(5)), 10).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(BackendError)
      expect(error).toMatchObject({ operation: 'createFile', path: 's3://test-bucket/x.bin' })
    })

    test('openRead streams the object body', async () => {
      fake.put('a.txt', 'alpha')
      const [file] = await (await storage.getRoot('')).listChildren()
      if (file?.kind !== 'file') throw new Error('expected a file')

      expect((await readAll(await file.openRead())).toString()).toBe('alpha')
    })

    test('openRead wraps a missing object', async () => {
      fake.put('a.txt', 'alpha')
      const [file] = await (await storage.getRoot('')).listChildren()
      if (file?.kind !== 'file') throw new Error('expected a file')
      fake.objects.delete('a.txt')

      await expect(file.openRead()).rejects.toMatchObject({ name: 'BackendError', operation: 'read' })
    })
  })

  describe('directories', () => {
    test('createDirectory writes a marker object', async () => {
      const root = await storage.getRoot('')

      const dir = await root.createDirectory('photos')

      expect(dir.fullName).toBe('s3://test-bucket/photos/')
      expect(fake.objects.has('photos/')).toBe(true)
    })

    test('delete removes every object under the prefix', async () => {
      fake.put('photos/', '')
      fake.put('photos/a.jpg', 'a')
      fake.put('photos/2024/b.jpg', 'b')
      fake.put('photos-old.txt', 'keep')
      const dir = (await (await storage.getRoot('')).listChildren()).find((c) => c.name === 'photos')
      if (!dir) throw new Error('expected a directory')

      await dir.delete()

      expect([...fake.objects.keys()]).toEqual(['photos-old.txt'])
      expect(fake.calls).toContain('DeleteBatch:3')
    })
  })

  test('mirrors a tree from the sync engine and skips it on the next run', async () => {
    const source = new MemoryStorage()
    const modifiedAt = new Date('2024-05-01T00:00:00.000Z')
    source.writeFile('docs/readme.md', '# notes', modifiedAt)
    source.writeFile('data.bin', createContent(40), modifiedAt)

    const first = await new SyncEngine().run(await source.getRoot(''), await storage.getRoot('mirror'))
    const second = await new SyncEngine().run(await source.getRoot(''), await storage.getRoot('mirror'))

    expect(first.status).toBe('completed')
    expect(first.statistics).toMatchObject({ directoriesCreated: 1, filesCreated: 2 })
    expect(fake.objects.get('mirror/docs/readme.md')?.body.toString()).toBe('# notes')
    expect(second.statistics).toMatchObject({ filesCreated: 0, filesUpdated: 0 })
  })
})
