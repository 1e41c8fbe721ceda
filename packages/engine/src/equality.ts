/**
 * Equality Evaluator
 *
 * Decides whether a source file and the target file of the same name are the
 * same. Cheap checks run first and the first proof of inequality wins, so
 * content is only read when every cheaper method agreed.
 */

import { createHash } from 'node:crypto'
import {
  DEFAULT_EQUALITY_METHODS,
  type DecisionMethod,
  type EqualityMethod,
  type EqualityMethodSet,
  type EqualityResult,
  type FileItem,
} from '@strata/core'

/**
 * Compute the SHA-256 digest of a file's content (hex).
 */
export async function computeDigest(file: FileItem, signal?: AbortSignal): Promise<string> {
  const hash = createHash('sha256')
  const stream = await file.openRead(signal)
  for await (const chunk of stream) {
    signal?.throwIfAborted()
    hash.update(chunk)
  }
  return hash.digest('hex')
}

export class EqualityEvaluator {
  readonly methods: EqualityMethodSet

  constructor(methods: Iterable<EqualityMethod> = DEFAULT_EQUALITY_METHODS) {
    this.methods = new Set(methods)
  }

  async evaluate(source: FileItem, target: FileItem, signal?: AbortSignal): Promise<EqualityResult> {
    if (this.methods.has('none')) {
      return { equal: false, method: 'none' }
    }

    if (this.methods.has('length') && source.length !== target.length) {
      return { equal: false, method: 'length' }
    }

    if (this.methods.has('modifiedTime') && source.modifiedAt.getTime() !== target.modifiedAt.getTime()) {
      return { equal: false, method: 'modifiedTime' }
    }

    if (this.methods.has('content')) {
      const sourceDigest = await computeDigest(source, signal)
      const targetDigest = await computeDigest(target, signal)
      if (sourceDigest !== targetDigest) {
        return { equal: false, method: 'content' }
      }
    }

    return { equal: true, method: this.strongestMethod() }
  }

  private strongestMethod(): DecisionMethod {
    if (this.methods.has('content')) return 'content'
    if (this.methods.has('modifiedTime')) return 'modifiedTime'
    if (this.methods.has('length')) return 'length'
    return 'name'
  }
}
