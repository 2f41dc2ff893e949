/**
 * Caller-owned cache for highlight results.
 * LRU with TTL, keyed by document identity, annotation schema revision,
 * schema variant and selected meso-narrative.
 */

import type { AnnotationSchemaVariant, HighlightResult } from '@/types/narratives'

export interface HighlightCacheConfig {
  enabled: boolean
  ttl: number // Time to live in milliseconds
  maxSize: number // Maximum number of entries
}

export interface HighlightCacheKey {
  documentId: string
  schemaRevision: number
  variant: AnnotationSchemaVariant
  /** Consolidated payload field; changes which entries are read */
  annotationField?: string
  /** Model name given to consolidated entries without one */
  defaultModel?: string
  selectedMeso?: string | null
}

export interface CacheStats {
  hits: number
  misses: number
  evictions: number
  size: number
  hitRate: number
}

interface CacheEntry {
  documentId: string
  value: HighlightResult
  timestamp: number
}

export const DEFAULT_CACHE_CONFIG: HighlightCacheConfig = {
  enabled: true,
  ttl: 10 * 60 * 1000,
  maxSize: 200,
}

/**
 * Serialize a cache key. Every part changes the rendered output.
 */
export function serializeCacheKey(key: HighlightCacheKey): string {
  return JSON.stringify([
    key.documentId,
    key.schemaRevision,
    key.variant,
    key.annotationField ?? null,
    key.defaultModel ?? null,
    key.selectedMeso ?? null,
  ])
}

export class HighlightCache {
  // Map iteration order doubles as recency order: oldest first
  private entries = new Map<string, CacheEntry>()
  private config: HighlightCacheConfig
  private stats: CacheStats = { hits: 0, misses: 0, evictions: 0, size: 0, hitRate: 0 }

  constructor(config: Partial<HighlightCacheConfig> = {}, private readonly now: () => number = Date.now) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config }
  }

  /**
   * Gets a cached result, refreshing its recency.
   */
  get(key: HighlightCacheKey): HighlightResult | undefined {
    if (!this.config.enabled) {
      return undefined
    }

    const serialized = serializeCacheKey(key)
    const entry = this.entries.get(serialized)

    if (!entry || this.isExpired(entry)) {
      if (entry) this.entries.delete(serialized)
      this.stats.misses++
      this.updateStats()
      return undefined
    }

    this.entries.delete(serialized)
    this.entries.set(serialized, entry)
    this.stats.hits++
    this.updateStats()
    return entry.value
  }

  /**
   * Stores a result, evicting the least recently used entry when full.
   */
  set(key: HighlightCacheKey, value: HighlightResult): void {
    if (!this.config.enabled) {
      return
    }

    const serialized = serializeCacheKey(key)
    this.entries.delete(serialized)

    while (this.entries.size >= this.config.maxSize) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
      this.stats.evictions++
    }

    this.entries.set(serialized, { documentId: key.documentId, value, timestamp: this.now() })
    this.updateStats()
  }

  /**
   * Returns the cached result or computes and stores it.
   */
  getOrCompute(key: HighlightCacheKey, compute: () => HighlightResult): HighlightResult {
    const cached = this.get(key)
    if (cached) {
      return cached
    }

    const value = compute()
    this.set(key, value)
    return value
  }

  /**
   * Drops every entry of a document (all revisions, variants and selections).
   *
   * @returns Number of entries removed
   */
  invalidate(documentId: string): number {
    let removed = 0
    for (const [serialized, entry] of this.entries) {
      if (entry.documentId === documentId) {
        this.entries.delete(serialized)
        removed++
      }
    }
    this.updateStats()
    return removed
  }

  /**
   * Clears the entire cache and its statistics.
   */
  clear(): void {
    this.entries.clear()
    this.stats = { hits: 0, misses: 0, evictions: 0, size: 0, hitRate: 0 }
  }

  getStats(): CacheStats {
    return { ...this.stats }
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.timestamp > this.config.ttl
  }

  private updateStats(): void {
    const total = this.stats.hits + this.stats.misses
    this.stats.size = this.entries.size
    this.stats.hitRate = total > 0 ? this.stats.hits / total : 0
  }
}
