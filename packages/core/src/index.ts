// Core types - shared across all packages
export * from './types'

// Storage abstraction - implemented by @strata/local, @strata/s3 and @strata/aes
export * from './storage'

// Error taxonomy
export * from './errors'

// Schemas for validation
export * from './schemas/sync-config'

// Case conversion utilities (snake_case → camelCase)
export * from './case-convert'
