import { beforeEach, describe, expect, test } from 'vitest'
import type { EqualityMethod } from '@strata/core'
import { createContent } from '../../../test/fixtures'
import { MemoryStorage } from '../../../test/memory-storage'
import { EqualityEvaluator, computeDigest } from './equality'

const EARLIER = new Date('2024-01-15T14:30:00.000Z')
const LATER = new Date('2024-01-15T14:30:00.001Z')

describe('EqualityEvaluator', () => {
  let storage: MemoryStorage

  beforeEach(() => {
    storage = new MemoryStorage()
  })

  function reads(): string[] {
    return storage.operations.filter((op) => op.startsWith('read:'))
  }

  describe('identical files', () => {
    const methodSets: EqualityMethod[][] = [
      ['length'],
      ['modifiedTime'],
      ['content'],
      ['length', 'modifiedTime'],
      ['length', 'content'],
      ['length', 'modifiedTime', 'content'],
    ]

    for (const methods of methodSets) {
      test(`are equal under {${methods.join(', ')}}`, async () => {
        storage.writeFile('a.txt', createContent(40), EARLIER)
        const file = await storage.file('a.txt')

        const result = await new EqualityEvaluator(methods).evaluate(file, file)

        expect(result.equal).toBe(true)
      })
    }
  })

  test('different lengths are unequal without reading content', async () => {
    storage.writeFile('a.txt', 'short', EARLIER)
    storage.writeFile('b.txt', 'much longer', EARLIER)
    const evaluator = new EqualityEvaluator(['length', 'modifiedTime', 'content'])

    const result = await evaluator.evaluate(await storage.file('a.txt'), await storage.file('b.txt'))

    expect(result).toEqual({ equal: false, method: 'length' })
    expect(reads()).toEqual([])
  })

  test('modification times are compared to the millisecond', async () => {
    storage.writeFile('a.txt', 'same', EARLIER)
    storage.writeFile('b.txt', 'same', LATER)
    const evaluator = new EqualityEvaluator(['length', 'modifiedTime', 'content'])

    const result = await evaluator.evaluate(await storage.file('a.txt'), await storage.file('b.txt'))

    expect(result).toEqual({ equal: false, method: 'modifiedTime' })
    expect(reads()).toEqual([])
  })

  test('content digest detects same-length changes', async () => {
    storage.writeFile('a.txt', 'abcd', EARLIER)
    storage.writeFile('b.txt', 'abce', EARLIER)
    const evaluator = new EqualityEvaluator(['length', 'modifiedTime', 'content'])

    const result = await evaluator.evaluate(await storage.file('a.txt'), await storage.file('b.txt'))

    expect(result).toEqual({ equal: false, method: 'content' })
    expect(reads()).toEqual(['read:a.txt', 'read:b.txt'])
  })

  test('digest-only comparison ignores modification time', async () => {
    const content = createContent(100)
    storage.writeFile('a.txt', content, EARLIER)
    storage.writeFile('b.txt', content, LATER)

    const result = await new EqualityEvaluator(['content']).evaluate(
      await storage.file('a.txt'),
      await storage.file('b.txt'),
    )

    expect(result).toEqual({ equal: true, method: 'content' })
  })

  test('reports the strongest method that proved equality', async () => {
    storage.writeFile('a.txt', 'same', EARLIER)
    const file = await storage.file('a.txt')

    const result = await new EqualityEvaluator(['length', 'modifiedTime']).evaluate(file, file)

    expect(result).toEqual({ equal: true, method: 'modifiedTime' })
  })

  test('empty method set matches by name only', async () => {
    storage.writeFile('a.txt', 'one', EARLIER)
    storage.writeFile('b.txt', 'different', LATER)

    const result = await new EqualityEvaluator([]).evaluate(
      await storage.file('a.txt'),
      await storage.file('b.txt'),
    )

    expect(result).toEqual({ equal: true, method: 'name' })
    expect(reads()).toEqual([])
  })

  test('none treats every pair as unequal', async () => {
    storage.writeFile('a.txt', 'same', EARLIER)
    const file = await storage.file('a.txt')

    const result = await new EqualityEvaluator(['none', 'length']).evaluate(file, file)

    expect(result).toEqual({ equal: false, method: 'none' })
  })

  test('defaults to length and modification time', () => {
    const evaluator = new EqualityEvaluator()

    expect([...evaluator.methods]).toEqual(['length', 'modifiedTime'])
  })
})

describe('computeDigest', () => {
  test('returns the SHA-256 of the content', async () => {
    const storage = new MemoryStorage({ readChunkSize: 2 })
    storage.writeFile('hello.txt', 'hello')

    const digest = await computeDigest(await storage.file('hello.txt'))

    expect(digest).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824')
  })

  test('handles empty files', async () => {
    const storage = new MemoryStorage()
    storage.writeFile('empty.txt', '')

    const digest = await computeDigest(await storage.file('empty.txt'))

    expect(digest).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855')
  })
})
