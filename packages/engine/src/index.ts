// Sync engine
export { SyncEngine, type RunOptions } from './engine'

// Equality decisions
export { EqualityEvaluator, computeDigest } from './equality'

// Bounded retries
export { RetryController, type RetryContext, type RetryControllerConfig } from './retry'

// Observer helpers
export { combineObservers } from './observers'
export { createRunMetrics, type RunMetrics } from './metrics'
