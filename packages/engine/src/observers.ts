import type { SyncObserver } from '@strata/core'

/**
 * Fan one set of notifications out to several observers, in order.
 * Records are shared, so a flag set by one observer is seen by the next.
 */
export function combineObservers(...observers: Array<SyncObserver | undefined>): SyncObserver {
  const active = observers.filter((o): o is SyncObserver => o !== undefined)
  return {
    onAction: (record) => {
      for (const observer of active) observer.onAction?.(record)
    },
    onError: (record) => {
      for (const observer of active) observer.onError?.(record)
    },
    onProgress: (record) => {
      for (const observer of active) observer.onProgress?.(record)
    },
  }
}
