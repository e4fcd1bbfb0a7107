/**
 * Response Cache
 *
 * LRU cache of answered queries keyed by a fingerprint of the query text,
 * with a TTL per entry.
 *
 * @example
 * ```typescript
 * const cache = new ResponseCache({ maxSize: 100, ttlSeconds: 1800 });
 * const fingerprint = fingerprintQuery(queryText);
 *
 * const cached = cache.get(fingerprint);
 * if (cached) {
 *   return cached;
 * }
 *
 * const { response } = await orchestrator.run(request);
 * cache.set(fingerprint, response);
 * ```
 */

import { createHash } from 'node:crypto';

import { z } from 'zod';

import type { QueryResponse } from './types.js';

// =============================================================================
// Types & Schemas
// =============================================================================

export const ResponseCacheConfigSchema = z.object({
  /** Maximum number of cached responses */
  maxSize: z.number().int().positive().default(100),
  /** Default entry lifetime in seconds (30 minutes); 0 disables expiry */
  ttlSeconds: z.number().int().nonnegative().default(1800),
  /**
   * Callback for cache updates (monitoring/logging)
   */
  onUpdate: z
    .function()
    .args(
      z.object({
        type: z.enum(['hit', 'miss', 'set', 'evict', 'expire', 'delete', 'clear']),
        key: z.string().optional(),
      })
    )
    .returns(z.void())
    .optional(),
});

export type ResponseCacheConfig = z.infer<typeof ResponseCacheConfigSchema>;
export type ResponseCacheConfigInput = z.input<typeof ResponseCacheConfigSchema>;

export type ResponseCacheEventType = 'hit' | 'miss' | 'set' | 'evict' | 'expire' | 'delete' | 'clear';

export interface CacheEntry {
  response: QueryResponse;
  /** Epoch milliseconds */
  cachedAt: number;
  /** Epoch milliseconds; Infinity when the entry never expires */
  expiresAt: number;
  accessCount: number;
}

export interface ResponseCacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** Hits over lookups, 0 to 1 */
  hitRate: number;
  evictions: number;
  expirations: number;
}

/**
 * Cache key of a query: SHA-256 of the trimmed, lowercased text. Stable
 * across processes; independent of query id, time and provider.
 */
export function fingerprintQuery(queryText: string): string {
  return createHash('sha256').update(queryText.trim().toLowerCase(), 'utf8').digest('hex');
}

// =============================================================================
// Response Cache Class
// =============================================================================

export class ResponseCache {
  private readonly config: ResponseCacheConfig;
  private readonly cache = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private stats = { hits: 0, misses: 0, evictions: 0, expirations: 0 };

  /**
   * @param now - Clock in epoch milliseconds
   */
  constructor(config?: ResponseCacheConfigInput, now: () => number = Date.now) {
    this.config = ResponseCacheConfigSchema.parse(config ?? {});
    this.now = now;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Cached response for the fingerprint, or undefined when absent or expired
   */
  get(fingerprint: string): QueryResponse | undefined {
    const entry = this.cache.get(fingerprint);

    if (!entry) {
      this.stats.misses++;
      this.notifyUpdate('miss', fingerprint);
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(fingerprint);
      this.stats.misses++;
      this.stats.expirations++;
      this.notifyUpdate('expire', fingerprint);
      return undefined;
    }

    entry.accessCount++;

    // Move to end (most recently used) by re-inserting
    this.cache.delete(fingerprint);
    this.cache.set(fingerprint, entry);

    this.stats.hits++;
    this.notifyUpdate('hit', fingerprint);
    return copyResponse(entry.response);
  }

  /**
   * @param ttlSeconds - Lifetime of this entry; defaults to the configured TTL
   */
  set(fingerprint: string, response: QueryResponse, ttlSeconds?: number): void {
    this.cache.delete(fingerprint);

    while (this.cache.size >= this.config.maxSize) {
      const oldest = this.cache.keys().next().value;
      if (oldest === undefined) {
        break;
      }
      this.cache.delete(oldest);
      this.stats.evictions++;
      this.notifyUpdate('evict', oldest);
    }

    const ttl = ttlSeconds ?? this.config.ttlSeconds;
    const now = this.now();
    this.cache.set(fingerprint, {
      response: copyResponse(response),
      cachedAt: now,
      expiresAt: ttl > 0 ? now + ttl * 1000 : Number.POSITIVE_INFINITY,
      accessCount: 0,
    });
    this.notifyUpdate('set', fingerprint);
  }

  has(fingerprint: string): boolean {
    const entry = this.cache.get(fingerprint);
    if (!entry) {
      return false;
    }
    if (this.isExpired(entry)) {
      this.cache.delete(fingerprint);
      this.stats.expirations++;
      return false;
    }
    return true;
  }

  delete(fingerprint: string): boolean {
    const deleted = this.cache.delete(fingerprint);
    if (deleted) {
      this.notifyUpdate('delete', fingerprint);
    }
    return deleted;
  }

  clear(): void {
    this.cache.clear();
    this.stats = { hits: 0, misses: 0, evictions: 0, expirations: 0 };
    this.notifyUpdate('clear');
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): ResponseCacheStats {
    const lookups = this.stats.hits + this.stats.misses;
    return {
      size: this.cache.size,
      maxSize: this.config.maxSize,
      hits: this.stats.hits,
      misses: this.stats.misses,
      hitRate: lookups > 0 ? this.stats.hits / lookups : 0,
      evictions: this.stats.evictions,
      expirations: this.stats.expirations,
    };
  }

  /**
   * Remove all expired entries.
   *
   * @returns The number of entries removed
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (this.isExpired(entry)) {
        this.cache.delete(key);
        removed++;
        this.stats.expirations++;
      }
    }
    return removed;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private isExpired(entry: CacheEntry): boolean {
    return this.now() >= entry.expiresAt;
  }

  private notifyUpdate(type: ResponseCacheEventType, key?: string): void {
    if (this.config.onUpdate) {
      this.config.onUpdate({ type, key });
    }
  }
}

function copyResponse(response: QueryResponse): QueryResponse {
  return { ...response, sources: [...response.sources] };
}
