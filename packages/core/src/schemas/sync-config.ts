import { z } from 'zod'
import { type CamelCasedPropertiesDeep, snakeToCamelDeep } from '../case-convert'

const equalityMethod = z.enum(['none', 'length', 'modifiedTime', 'content'])

// =============================================================================
// Encryption
// =============================================================================

/**
 * AES encryption layer applied on top of a root's backend
 */
export const aesConfigSchema = z.object({
  password: z.string().min(1).describe('Password the content and name keys are derived from'),
  version: z
    .union([z.literal(1), z.literal(2)])
    .optional()
    .default(2)
    .describe('Content scheme version used when writing (reading follows each file header)'),
  encrypt_file_names: z.boolean().optional().default(false).describe('Encrypt file names'),
  encrypt_directory_names: z
    .boolean()
    .optional()
    .default(false)
    .describe('Encrypt directory names'),
})

// =============================================================================
// Roots
// =============================================================================

/**
 * Local filesystem root
 */
export const fsRootConfigSchema = z.object({
  provider: z.literal('fs'),
  path: z.string().min(1).describe('Directory path, created when missing'),
  aes: aesConfigSchema.optional(),
})

/**
 * S3 (or S3-compatible) root
 */
export const s3RootConfigSchema = z.object({
  provider: z.literal('s3'),
  path: z.string().optional().default('').describe('Key prefix used as the root directory'),
  bucket: z.string().min(1).describe('S3 bucket name'),
  region: z.string().optional().default('us-east-1').describe('AWS region'),
  endpoint: z.string().optional().describe('Custom S3 endpoint (for S3-compatible services)'),
  access_key_id: z.string().optional().describe('Access key ID (optional if using IAM role)'),
  secret_access_key: z
    .string()
    .optional()
    .describe('Secret access key (optional if using IAM role)'),
  force_path_style: z.boolean().optional().default(false),
  track_modified_time: z
    .boolean()
    .optional()
    .default(true)
    .describe('Store and read back source modification times as object metadata'),
  aes: aesConfigSchema.optional(),
})

/**
 * Root configuration (extensible for future providers)
 */
export const rootConfigSchema = z.discriminatedUnion('provider', [
  fsRootConfigSchema,
  s3RootConfigSchema,
])

// =============================================================================
// Policy
// =============================================================================

export const syncPolicySchema = z.object({
  create_directories: z.boolean().optional().default(true),
  delete_directories: z.boolean().optional().default(false),
  create_files: z.boolean().optional().default(true),
  update_files: z.boolean().optional().default(true),
  delete_files: z.boolean().optional().default(false),
  retry_count: z.number().int().min(0).optional().default(3).describe('Immediate retries per operation'),
})

/**
 * Sync configuration file schema
 */
export const syncConfigSchema = z.object({
  source: rootConfigSchema.describe('Tree to read from'),
  target: rootConfigSchema.describe('Tree to write to'),
  policy: syncPolicySchema.optional().default({}),
  equality_methods: z
    .array(equalityMethod)
    .optional()
    .default(['length', 'modifiedTime'])
    .describe('Methods deciding whether two files are the same'),
  continue_on_error: z
    .boolean()
    .optional()
    .default(false)
    .describe('Skip items whose operations still fail after all retries'),
})

// =============================================================================
// Inferred Types
// =============================================================================

export type AesConfigRaw = z.infer<typeof aesConfigSchema>
export type RootConfigRaw = z.infer<typeof rootConfigSchema>
export type SyncConfigRaw = z.infer<typeof syncConfigSchema>

export type AesConfig = CamelCasedPropertiesDeep<AesConfigRaw>
export type RootConfig = CamelCasedPropertiesDeep<RootConfigRaw>
export type FsRootConfig = Extract<RootConfig, { provider: 'fs' }>
export type S3RootConfig = Extract<RootConfig, { provider: 's3' }>
export type SyncConfig = CamelCasedPropertiesDeep<SyncConfigRaw>

/**
 * Validation error with path information
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

/**
 * Parse and validate sync configuration data (returns camelCase)
 */
export function parseSyncConfig(data: unknown): SyncConfig {
  return snakeToCamelDeep(syncConfigSchema.parse(data))
}

/**
 * Safely parse sync configuration data, returning result with errors (returns camelCase)
 */
export function safeParseSyncConfig(data: unknown): ParseResult<SyncConfig> {
  const result = syncConfigSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: snakeToCamelDeep(result.data) }
  }
  const errors = result.error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
  return { success: false, errors }
}
