/**
 * Storage Providers
 *
 * Maps the `provider` of a root configuration to the StorageBackend that
 * serves it. Each provider type (fs, s3, ...) implements StorageProvider.
 */

import { AesStorage } from '@strata/aes'
import { type ResolvedRoot, type RootConfig, type StorageBackend, resolveRoot } from '@strata/core'
import { LocalStorage } from '@strata/local'
import { S3Storage } from '@strata/s3'
import type { Logger } from './logger'

export interface StorageProvider {
  /**
   * The provider this entry handles.
   * @example 's3'
   */
  readonly type: string

  /**
   * Build a backend for a root configuration of this provider.
   */
  create(config: RootConfig, logger: Logger): StorageBackend
}

export const fsProvider: StorageProvider = {
  type: 'fs',
  create(config, logger) {
    if (config.provider !== 'fs') {
      throw new Error(`fs provider cannot serve '${config.provider}' roots`)
    }
    return new LocalStorage({ logger })
  },
}

export const s3Provider: StorageProvider = {
  type: 's3',
  create(config, logger) {
    if (config.provider !== 's3') {
      throw new Error(`s3 provider cannot serve '${config.provider}' roots`)
    }
    return new S3Storage({
      bucket: config.bucket,
      region: config.region,
      endpoint: config.endpoint,
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
      forcePathStyle: config.forcePathStyle,
      trackModifiedTime: config.trackModifiedTime,
      logger,
    })
  },
}

/**
 * Registry for storage providers.
 */
export class StorageProviderRegistry {
  private providers: Map<string, StorageProvider> = new Map()

  constructor() {
    this.register(fsProvider)
    this.register(s3Provider)
  }

  /**
   * Register a provider, replacing any previous one of the same type.
   */
  register(provider: StorageProvider): void {
    this.providers.set(provider.type, provider)
  }

  /**
   * @throws Error if no provider is registered for the root's type
   */
  getProvider(config: RootConfig): StorageProvider {
    const provider = this.providers.get(config.provider)
    if (!provider) {
      throw new Error(`No provider registered for '${config.provider}'`)
    }
    return provider
  }

  hasProvider(type: string): boolean {
    return this.providers.has(type)
  }

  /**
   * Build the backend for a root, wrapped in an AesStorage when the root
   * configures encryption.
   */
  createBackend(config: RootConfig, logger: Logger): StorageBackend {
    const backend = this.getProvider(config).create(config, logger)
    if (!config.aes) return backend
    return new AesStorage(backend, {
      password: config.aes.password,
      version: config.aes.version,
      encryptFileNames: config.aes.encryptFileNames,
      encryptDirectoryNames: config.aes.encryptDirectoryNames,
      logger,
    })
  }

  /**
   * Build the backend for a root, log in when required and get (or create)
   * its root directory.
   */
  async openRoot(config: RootConfig, logger: Logger, signal?: AbortSignal): Promise<ResolvedRoot> {
    return resolveRoot(this.createBackend(config, logger), config.path, signal)
  }
}

/**
 * Default registry with the built-in providers.
 */
export const defaultStorageProviderRegistry = new StorageProviderRegistry()
