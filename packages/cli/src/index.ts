import { writeFile } from 'node:fs/promises'
import { EQUALITY_METHODS, errorMessage } from '@strata/core'
import { createRunMetrics } from '@strata/engine'
import { InvalidArgumentError, Option, program } from 'commander'
import { ConfigValidationError, type RunCommandOptions, resolveSyncConfig } from './config'
import { LOG_LEVELS, createLogger } from './logger'
import { exitCodeFor, runSync } from './run'

const DEFAULT_LOG_LEVEL = process.env.STRATA_LOG_LEVEL ?? 'info'

function parseRetryCount(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

program.name('strata').description('Mirror a directory tree between storage backends').version('0.1.0')

// ─────────────────────────────────────────────────────────────────────────────
// Run
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('run')
  .description('Synchronize the target tree with the source tree')
  .option('-c, --config <file>', 'YAML configuration file')
  .option('-s, --source <path>', 'Source root path')
  .option('--source-provider <provider>', 'Source provider (fs, s3)')
  .option('--source-password <password>', 'Decrypt the source with this AES password')
  .option('-t, --target <path>', 'Target root path')
  .option('--target-provider <provider>', 'Target provider (fs, s3)')
  .option('--target-password <password>', 'Encrypt the target with this AES password')
  .option('-e, --equality <methods>', `Comma-separated equality methods (${EQUALITY_METHODS.join(', ')})`)
  .option('-r, --retry-count <count>', 'Immediate retries per failed operation', parseRetryCount)
  .option('--create-directories', 'Create missing directories')
  .option('--no-create-directories', 'Do not create missing directories')
  .option('--delete-directories', 'Delete directories missing from the source')
  .option('--no-delete-directories', 'Keep directories missing from the source')
  .option('--create-files', 'Create missing files')
  .option('--no-create-files', 'Do not create missing files')
  .option('--update-files', 'Replace files that differ')
  .option('--no-update-files', 'Keep files that differ')
  .option('--delete-files', 'Delete files missing from the source')
  .option('--no-delete-files', 'Keep files missing from the source')
  .option('--continue-on-error', 'Skip items that still fail after all retries')
  .option('--metrics-file <file>', 'Write Prometheus metrics to this file after the run')
  .addOption(new Option('-l, --log-level <level>', 'Log level').choices(LOG_LEVELS).default(DEFAULT_LOG_LEVEL))
  .action(async (options: RunCommandOptions) => {
    const logger = createLogger(options.logLevel)
    try {
      const config = resolveSyncConfig(options)
      const metrics = createRunMetrics()

      const controller = new AbortController()
      const onInterrupt = () => {
        logger.warn('Interrupted, stopping after the current operation')
        controller.abort()
      }
      process.once('SIGINT', onInterrupt)

      try {
        const result = await runSync(config, { logger, signal: controller.signal, metrics })
        if (result.status === 'failed') {
          console.error(errorMessage(result.error))
        }
        if (options.metricsFile) {
          await writeFile(options.metricsFile, await metrics.registry.metrics())
        }
        process.exitCode = exitCodeFor(result.status)
      } finally {
        process.off('SIGINT', onInterrupt)
      }
    } catch (e) {
      if (e instanceof ConfigValidationError) {
        console.error(e.message)
      } else {
        logger.error({ err: e }, 'Run failed')
        console.error(errorMessage(e))
      }
      process.exitCode = 1
    }
  })

program.parseAsync().catch((e: unknown) => {
  console.error(errorMessage(e))
  process.exitCode = 1
})
