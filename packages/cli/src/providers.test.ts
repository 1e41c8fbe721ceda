import { describe, expect, test } from 'vitest'
import { AesStorage } from '@strata/aes'
import { LocalStorage } from '@strata/local'
import { S3Storage } from '@strata/s3'
import pino from 'pino'
import { MemoryStorage } from '../../../test/memory-storage'
import { StorageProviderRegistry, defaultStorageProviderRegistry } from './providers'

const logger = pino({ level: 'silent' })

describe('StorageProviderRegistry', () => {
  test('has the built-in providers', () => {
    expect(defaultStorageProviderRegistry.hasProvider('fs')).toBe(true)
    expect(defaultStorageProviderRegistry.hasProvider('s3')).toBe(true)
    expect(defaultStorageProviderRegistry.hasProvider('webdav')).toBe(false)
  })

  test('creates a local backend for fs roots', () => {
    const backend = new StorageProviderRegistry().createBackend({ provider: 'fs', path: '/data' }, logger)

    expect(backend).toBeInstanceOf(LocalStorage)
    expect(backend.name).toBe('fs')
  })

  test('creates an S3 backend for s3 roots', () => {
    const backend = new StorageProviderRegistry().createBackend(
      {
        provider: 's3',
        path: 'photos',
        bucket: 'team-backups',
        region: 'eu-west-1',
        forcePathStyle: true,
        trackModifiedTime: true,
      },
      logger,
    )

    expect(backend).toBeInstanceOf(S3Storage)
    expect(backend.name).toBe('s3')
  })

  test('wraps the backend when the root configures encryption', () => {
    const backend = new StorageProviderRegistry().createBackend(
      {
        provider: 'fs',
        path: '/vault',
        aes: { password: 'test-secret', version: 1, encryptFileNames: true, encryptDirectoryNames: false },
      },
      logger,
    )

    expect(backend).toBeInstanceOf(AesStorage)
    expect(backend.name).toBe('aes(fs)')
  })

  test('a registered provider replaces the built-in one', async () => {
    const memory = new MemoryStorage({ login: true })
    const registry = new StorageProviderRegistry()
    registry.register({ type: 'fs', create: () => memory })

    const root = await registry.openRoot({ provider: 'fs', path: 'backup/daily' }, logger)

    expect(root.backend).toBe(memory)
    expect(root.directory.name).toBe('daily')
    expect(memory.loginCount).toBe(1)
    expect(memory.isDirectory('backup/daily')).toBe(true)
  })
})
