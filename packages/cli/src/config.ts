/**
 * Run Configuration
 *
 * Builds the sync configuration from an optional YAML file, environment
 * defaults and command-line options (highest precedence), then validates the
 * result with the shared zod schema.
 */

import { readFileSync } from 'node:fs'
import { type SyncConfig, type ValidationError, safeParseSyncConfig } from '@strata/core'
import { parse as parseYaml } from 'yaml'

/**
 * Options accepted by `strata run`, as parsed by commander.
 */
export interface RunCommandOptions {
  config?: string
  source?: string
  sourceProvider?: string
  sourcePassword?: string
  target?: string
  targetProvider?: string
  targetPassword?: string
  equality?: string
  retryCount?: number
  createDirectories?: boolean
  deleteDirectories?: boolean
  createFiles?: boolean
  updateFiles?: boolean
  deleteFiles?: boolean
  continueOnError?: boolean
  metricsFile?: string
  logLevel?: string
}

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly origin: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid configuration in ${origin}:\n${errorList}`)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} syntax; unknown variables are left as they are.
 */
export function interpolateEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (match: string, varName: string) => {
    const value = env[varName]
    return value === undefined ? match : value
  })
}

type RawObject = Record<string, unknown>

function isRawObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(parent: RawObject, key: string): RawObject {
  const value = parent[key]
  const copy: RawObject = isRawObject(value) ? { ...value } : {}
  parent[key] = copy
  return copy
}

/**
 * Read a YAML configuration file, interpolating ${VAR} references.
 * Returns the raw (snake_case, unvalidated) document.
 */
export function readConfigFile(filePath: string, env: NodeJS.ProcessEnv = process.env): RawObject {
  const content = readFileSync(filePath, 'utf-8')
  const document: unknown = parseYaml(interpolateEnvVars(content, env))
  if (document === null || document === undefined) return {}
  if (!isRawObject(document)) {
    throw new ConfigValidationError(filePath, [{ path: '/', message: 'Expected a mapping at the top level' }])
  }
  return document
}

function applyRootOptions(
  raw: RawObject,
  key: 'source' | 'target',
  path: string | undefined,
  provider: string | undefined,
  password: string | undefined,
): void {
  if (path === undefined && provider === undefined && password === undefined) return
  const root = section(raw, key)
  if (provider !== undefined) root.provider = provider
  else if (root.provider === undefined) root.provider = 'fs'
  if (path !== undefined) root.path = path
  if (password !== undefined) section(root, 'aes').password = password
}

function parseRetryCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? undefined : parsed
}

/**
 * Merge the configuration file, environment defaults and command-line
 * options, and validate the result.
 *
 * @throws ConfigValidationError when the merged configuration is invalid
 */
export function resolveSyncConfig(options: RunCommandOptions, env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const raw: RawObject = options.config ? readConfigFile(options.config, env) : {}

  applyRootOptions(raw, 'source', options.source, options.sourceProvider, options.sourcePassword)
  applyRootOptions(raw, 'target', options.target, options.targetProvider, options.targetPassword)

  const policy = section(raw, 'policy')
  const envRetryCount = parseRetryCount(env.STRATA_RETRY_COUNT)
  if (options.retryCount !== undefined) policy.retry_count = options.retryCount
  else if (policy.retry_count === undefined && envRetryCount !== undefined) policy.retry_count = envRetryCount

  const flags = {
    create_directories: options.createDirectories,
    delete_directories: options.deleteDirectories,
    create_files: options.createFiles,
    update_files: options.updateFiles,
    delete_files: options.deleteFiles,
  }
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) policy[key] = value
  }

  if (options.equality !== undefined) {
    raw.equality_methods = options.equality
      .split(',')
      .map((method) => method.trim())
      .filter((method) => method.length > 0)
  }
  if (options.continueOnError !== undefined) raw.continue_on_error = options.continueOnError

  const result = safeParseSyncConfig(raw)
  if (!result.success) {
    throw new ConfigValidationError(options.config ?? 'command-line options', result.errors)
  }
  return result.data
}
