/**
 * Run Metrics
 *
 * Prometheus counters fed by a sync observer. Callers pass their own
 * registry so separate runs (and tests) stay isolated.
 */

import type { SyncObserver } from '@strata/core'
import { Counter, Registry } from 'prom-client'

export interface RunMetrics {
  registry: Registry
  actionsTotal: Counter<'action' | 'method'>
  errorsTotal: Counter<'exhausted'>
  bytesCopiedTotal: Counter
  observer: SyncObserver
}

export function createRunMetrics(registry: Registry = new Registry()): RunMetrics {
  const actionsTotal = new Counter({
    name: 'strata_actions_total',
    help: 'Sync decisions by action and equality method',
    labelNames: ['action', 'method'] as const,
    registers: [registry],
  })

  const errorsTotal = new Counter({
    name: 'strata_errors_total',
    help: 'Failed storage operations (exhausted=true once retries ran out)',
    labelNames: ['exhausted'] as const,
    registers: [registry],
  })

  const bytesCopiedTotal = new Counter({
    name: 'strata_bytes_copied_total',
    help: 'Bytes of completed file copies',
    registers: [registry],
  })

  const observer: SyncObserver = {
    onAction: (record) => {
      actionsTotal.inc({ action: record.action, method: record.method })
      // Counted once per completed copy, whatever the attempts before it streamed
      if ((record.action === 'create' || record.action === 'update') && record.source?.kind === 'file') {
        bytesCopiedTotal.inc(record.source.length)
      }
    },
    onError: (record) => {
      errorsTotal.inc({ exhausted: String(record.exhausted) })
    },
  }

  return { registry, actionsTotal, errorsTotal, bytesCopiedTotal, observer }
}
