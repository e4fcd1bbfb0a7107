/**
 * Embedding Cache Module
 *
 * In-memory LRU cache for query embeddings, so that repeated or paraphrased
 * queries do not hit the provider twice within a process.
 *
 * @example
 * ```typescript
 * const cache = new EmbeddingCache({ maxSize: 1000 });
 * cache.set(generateCacheKey('bge-m3', 'thời hiệu khởi kiện'), vector);
 * const stats = cache.getStats();
 * ```
 */

import { z } from 'zod';

// =============================================================================
// Cache Configuration Types
// =============================================================================

export const EmbeddingCacheConfigSchema = z.object({
  /**
   * Maximum number of entries in the cache.
   * When exceeded, least recently used entries are evicted.
   * @default 1000
   */
  maxSize: z.number().int().positive().default(1000),

  /**
   * Time-to-live for cache entries in milliseconds; 0 disables expiry
   * @default 0
   */
  ttlMs: z.number().int().nonnegative().default(0),

  /**
   * Callback when cache is updated (for monitoring).
   */
  onUpdate: z
    .function()
    .args(
      z.object({
        type: z.enum(['set', 'get', 'delete', 'evict', 'expire', 'clear']),
        key: z.string().optional(),
        hit: z.boolean().optional(),
      })
    )
    .returns(z.void())
    .optional(),
});

export type EmbeddingCacheConfig = z.infer<typeof EmbeddingCacheConfigSchema>;
export type EmbeddingCacheConfigInput = z.input<typeof EmbeddingCacheConfigSchema>;

export interface EmbeddingCacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses) */
  hitRate: number;
  evictions: number;
  expirations: number;
}

interface CacheEntry {
  vector: number[];
  createdAt: number;
}

type CacheEventType = 'set' | 'get' | 'delete' | 'evict' | 'expire' | 'clear';

// =============================================================================
// Embedding Cache Implementation
// =============================================================================

/**
 * LRU cache keyed by model and text. Map insertion order doubles as
 * recency order.
 */
export class EmbeddingCache {
  private readonly config: EmbeddingCacheConfig;
  private readonly cache = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(config?: EmbeddingCacheConfigInput) {
    this.config = EmbeddingCacheConfigSchema.parse(config ?? {});
  }

  get(key: string): number[] | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      this.notifyUpdate('get', key, false);
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.misses++;
      this.expirations++;
      this.notifyUpdate('expire', key);
      return undefined;
    }

    // Move to end (most recently used) by re-inserting
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.hits++;
    this.notifyUpdate('get', key, true);
    return [...entry.vector];
  }

  set(key: string, vector: readonly number[]): void {
    this.cache.delete(key);

    while (this.cache.size >= this.config.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
      this.evictions++;
      this.notifyUpdate('evict', oldest.value);
    }

    this.cache.set(key, { vector: [...vector], createdAt: Date.now() });
    this.notifyUpdate('set', key);
  }

  delete(key: string): boolean {
    const deleted = this.cache.delete(key);
    if (deleted) {
      this.notifyUpdate('delete', key);
    }
    return deleted;
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expirations = 0;
    this.notifyUpdate('clear');
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): EmbeddingCacheStats {
    const totalRequests = this.hits + this.misses;

    return {
      size: this.cache.size,
      maxSize: this.config.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: totalRequests > 0 ? this.hits / totalRequests : 0,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private isExpired(entry: CacheEntry): boolean {
    if (this.config.ttlMs <= 0) {
      return false;
    }
    return Date.now() - entry.createdAt > this.config.ttlMs;
  }

  private notifyUpdate(type: CacheEventType, key?: string, hit?: boolean): void {
    this.config.onUpdate?.({ type, key, hit });
  }
}

/**
 * Cache key for one text embedded by one model
 */
export function generateCacheKey(model: string, text: string): string {
  return `${model}:${text}`;
}
