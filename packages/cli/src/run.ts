/**
 * Run Orchestration
 *
 * Resolves both roots from a validated configuration, runs the sync engine
 * with console, metrics and error-policy observers, and prints the summary.
 */

import type { RunResult, RunStatus, SyncConfig, SyncObserver } from '@strata/core'
import { type RunMetrics, SyncEngine, combineObservers } from '@strata/engine'
import type { Logger } from './logger'
import { type WriteLine, createConsoleObserver, formatSummary } from './output'
import { StorageProviderRegistry, defaultStorageProviderRegistry } from './providers'

export interface RunSyncOptions {
  logger: Logger
  signal?: AbortSignal
  registry?: StorageProviderRegistry
  metrics?: RunMetrics
  /** @default console.log */
  write?: WriteLine
  /**
   * Print a line per copied chunk.
   * @default true
   */
  progress?: boolean
}

/**
 * Observer that skips items still failing after every retry.
 */
export const continueOnErrorObserver: SyncObserver = {
  onError: (record) => {
    if (record.exhausted) record.ignore = true
  },
}

export async function runSync(config: SyncConfig, options: RunSyncOptions): Promise<RunResult> {
  const { logger, signal } = options
  const registry = options.registry ?? defaultStorageProviderRegistry
  const write = options.write ?? console.log

  const source = await registry.openRoot(config.source, logger, signal)
  const target = await registry.openRoot(config.target, logger, signal)
  logger.info(
    { source: source.backend.name, target: target.backend.name, equalityMethods: config.equalityMethods },
    'Roots resolved',
  )

  const engine = new SyncEngine(
    {
      policy: config.policy,
      equalityMethods: config.equalityMethods,
    },
    logger,
  )

  const observer = combineObservers(
    createConsoleObserver({ write, progress: options.progress }),
    options.metrics?.observer,
    config.continueOnError ? continueOnErrorObserver : undefined,
  )

  const result = await engine.run(source.directory, target.directory, { signal, observer })

  if (result.status === 'cancelled') {
    write('Operation was cancelled')
  }
  for (const line of formatSummary(result.statistics)) {
    write(line)
  }
  return result
}

/**
 * Process exit code for a run status.
 */
export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case 'completed':
      return 0
    case 'cancelled':
      return 130
    case 'failed':
      return 1
  }
}
