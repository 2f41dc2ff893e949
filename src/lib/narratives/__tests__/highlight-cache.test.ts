/**
 * Tests for the highlight result cache.
 */

import type { HighlightResult } from '@/types/narratives'
import { HighlightCache, serializeCacheKey, type HighlightCacheKey } from '../highlight-cache'

function makeResult(html: string): HighlightResult {
  return {
    html,
    segments: [],
    outcomes: [],
    metadata: [],
    stats: {
      totalAnnotations: 0,
      withoutFragment: 0,
      located: { exact: 0, normalized: 0, 'gapped-regex': 0, 'fuzzy-anchor': 0 },
      unlocated: 0,
      totalTimeMs: 0,
    },
  }
}

function key(documentId: string, overrides: Partial<HighlightCacheKey> = {}): HighlightCacheKey {
  return { documentId, schemaRevision: 1, variant: 'per-model', ...overrides }
}

describe('HighlightCache', () => {
  let clock: number
  const now = () => clock

  beforeEach(() => {
    clock = 1_000
  })

  it('returns stored results and tracks hits and misses', () => {
    const cache = new HighlightCache({}, now)
    const result = makeResult('a')

    expect(cache.get(key('doc-1'))).toBeUndefined()
    cache.set(key('doc-1'), result)

    expect(cache.get(key('doc-1'))).toBe(result)
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, evictions: 0, size: 1, hitRate: 0.5 })
  })

  it('keeps selections, variants and revisions apart', () => {
    const cache = new HighlightCache({}, now)
    cache.set(key('doc-1', { selectedMeso: 'Growth' }), makeResult('selected'))

    expect(cache.get(key('doc-1'))).toBeUndefined()
    expect(cache.get(key('doc-1', { variant: 'consolidated', selectedMeso: 'Growth' }))).toBeUndefined()
    expect(cache.get(key('doc-1', { schemaRevision: 2, selectedMeso: 'Growth' }))).toBeUndefined()
    expect(cache.get(key('doc-1', { selectedMeso: 'Growth' }))?.html).toBe('selected')
  })

  it('misses when the consolidated payload settings change', () => {
    const cache = new HighlightCache({}, now)
    const stored = key('doc-1', { variant: 'consolidated', annotationField: 'annotations', defaultModel: 'consolidated' })
    cache.set(stored, makeResult('a'))

    expect(cache.get({ ...stored, annotationField: 'narratives' })).toBeUndefined()
    expect(cache.get({ ...stored, defaultModel: 'merged' })).toBeUndefined()
    expect(cache.get(stored)?.html).toBe('a')
  })

  it('expires entries after the ttl', () => {
    const cache = new HighlightCache({ ttl: 100 }, now)
    cache.set(key('doc-1'), makeResult('a'))

    clock += 100
    expect(cache.get(key('doc-1'))).toBeDefined()

    clock += 1
    expect(cache.get(key('doc-1'))).toBeUndefined()
    expect(cache.getStats().size).toBe(0)
  })

  it('evicts the least recently used entry when full', () => {
    const cache = new HighlightCache({ maxSize: 2 }, now)
    cache.set(key('a'), makeResult('a'))
    cache.set(key('b'), makeResult('b'))
    cache.get(key('a'))
    cache.set(key('c'), makeResult('c'))

    expect(cache.get(key('b'))).toBeUndefined()
    expect(cache.get(key('a'))?.html).toBe('a')
    expect(cache.get(key('c'))?.html).toBe('c')
    expect(cache.getStats().evictions).toBe(1)
  })

  it('computes once per key', () => {
    const cache = new HighlightCache({}, now)
    const compute = jest.fn(() => makeResult('computed'))

    const first = cache.getOrCompute(key('doc-1'), compute)
    const second = cache.getOrCompute(key('doc-1'), compute)

    expect(second).toBe(first)
    expect(compute).toHaveBeenCalledTimes(1)
  })

  it('invalidates every entry of a document', () => {
    const cache = new HighlightCache({}, now)
    cache.set(key('doc-1'), makeResult('a'))
    cache.set(key('doc-1', { schemaRevision: 2 }), makeResult('b'))
    cache.set(key('doc-2'), makeResult('c'))

    expect(cache.invalidate('doc-1')).toBe(2)
    expect(cache.getStats().size).toBe(1)
    expect(cache.get(key('doc-2'))?.html).toBe('c')
  })

  it('stores nothing when disabled', () => {
    const cache = new HighlightCache({ enabled: false }, now)
    cache.set(key('doc-1'), makeResult('a'))

    expect(cache.get(key('doc-1'))).toBeUndefined()
    expect(cache.getStats().size).toBe(0)
  })

  it('clears entries and statistics', () => {
    const cache = new HighlightCache({}, now)
    cache.set(key('doc-1'), makeResult('a'))
    cache.get(key('doc-1'))
    cache.clear()

    expect(cache.getStats()).toEqual({ hits: 0, misses: 0, evictions: 0, size: 0, hitRate: 0 })
  })
})

describe('serializeCacheKey', () => {
  it('treats an absent selection like null', () => {
    expect(serializeCacheKey(key('doc-1'))).toBe(serializeCacheKey(key('doc-1', { selectedMeso: null })))
    expect(serializeCacheKey(key('doc-1'))).toBe('["doc-1",1,"per-model",null,null,null]')
  })

  it('includes the consolidated payload settings', () => {
    const consolidated = key('doc-1', { variant: 'consolidated', annotationField: 'annotations', defaultModel: 'consolidated' })

    expect(serializeCacheKey(consolidated)).toBe('["doc-1",1,"consolidated","annotations","consolidated",null]')
    expect(serializeCacheKey({ ...consolidated, annotationField: 'narratives' })).not.toBe(serializeCacheKey(consolidated))
    expect(serializeCacheKey({ ...consolidated, defaultModel: 'merged' })).not.toBe(serializeCacheKey(consolidated))
  })
})
