/**
 * Unit Tests for ResponseCache
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ResponseCache,
  fingerprintQuery,
  type QueryResponse,
} from '../../lib/src/rag/index.js';

// =============================================================================
// Test Fixtures
// =============================================================================

function createResponse(overrides?: Partial<QueryResponse>): QueryResponse {
  return {
    queryText: 'Thời hạn nộp thuế là bao lâu?',
    responseText: 'Theo quy định trong [Mã tài liệu: QA_01], thời hạn là 30 ngày.',
    sources: ['Điều 5 văn bản ND126'],
    timestamp: 1700000000,
    ...overrides,
  };
}

function createClock(start = 1_000_000) {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

// =============================================================================
// fingerprintQuery
// =============================================================================

describe('fingerprintQuery', () => {
  it('should ignore surrounding whitespace and case', () => {
    expect(fingerprintQuery('  Thuế TNCN  ')).toBe(fingerprintQuery('thuế tncn'));
  });

  it('should differ for different queries', () => {
    expect(fingerprintQuery('thuế')).not.toBe(fingerprintQuery('phí'));
  });

  it('should be a 64 character hex digest', () => {
    expect(fingerprintQuery('câu hỏi')).toMatch(/^[0-9a-f]{64}$/);
  });
});

// =============================================================================
// ResponseCache
// =============================================================================

describe('ResponseCache', () => {
  it('should return the stored response', () => {
    const cache = new ResponseCache();
    const response = createResponse();

    cache.set('fp-1', response);

    expect(cache.get('fp-1')).toEqual(response);
    expect(cache.get('fp-2')).toBeUndefined();
  });

  it('should return copies that do not affect the stored entry', () => {
    const cache = new ResponseCache();
    cache.set('fp-1', createResponse());

    const first = cache.get('fp-1');
    first?.sources.push('Điều 9 văn bản X');

    expect(cache.get('fp-1')?.sources).toEqual(['Điều 5 văn bản ND126']);
  });

  it('should expire entries once the TTL has elapsed', () => {
    const clock = createClock();
    const cache = new ResponseCache({ ttlSeconds: 60 }, clock.now);
    cache.set('fp-1', createResponse());

    clock.advance(59_999);
    expect(cache.get('fp-1')).toBeDefined();

    clock.advance(1);
    expect(cache.get('fp-1')).toBeUndefined();
    expect(cache.getStats().expirations).toBe(1);
  });

  it('should honour a per-entry TTL', () => {
    const clock = createClock();
    const cache = new ResponseCache({ ttlSeconds: 60 }, clock.now);
    cache.set('short', createResponse(), 1);
    cache.set('long', createResponse());

    clock.advance(1000);

    expect(cache.has('short')).toBe(false);
    expect(cache.has('long')).toBe(true);
  });

  it('should keep entries forever with a TTL of 0', () => {
    const clock = createClock();
    const cache = new ResponseCache({ ttlSeconds: 0 }, clock.now);
    cache.set('fp-1', createResponse());

    clock.advance(365 * 24 * 3600 * 1000);

    expect(cache.get('fp-1')).toBeDefined();
  });

  it('should evict the least recently used entry when full', () => {
    const cache = new ResponseCache({ maxSize: 2 });
    cache.set('a', createResponse({ queryText: 'a' }));
    cache.set('b', createResponse({ queryText: 'b' }));

    cache.get('a');
    cache.set('c', createResponse({ queryText: 'c' }));

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.getStats().evictions).toBe(1);
  });

  it('should replace an existing entry without evicting', () => {
    const cache = new ResponseCache({ maxSize: 2 });
    cache.set('a', createResponse({ responseText: 'old' }));
    cache.set('b', createResponse());
    cache.set('a', createResponse({ responseText: 'new' }));

    expect(cache.size).toBe(2);
    expect(cache.get('a')?.responseText).toBe('new');
    expect(cache.getStats().evictions).toBe(0);
  });

  it('should track hits and misses', () => {
    const cache = new ResponseCache();
    cache.set('a', createResponse());

    cache.get('a');
    cache.get('a');
    cache.get('missing');
    cache.get('missing');

    expect(cache.getStats()).toEqual({
      size: 1,
      maxSize: 100,
      hits: 2,
      misses: 2,
      hitRate: 0.5,
      evictions: 0,
      expirations: 0,
    });
  });

  it('should prune expired entries', () => {
    const clock = createClock();
    const cache = new ResponseCache({ ttlSeconds: 10 }, clock.now);
    cache.set('a', createResponse());
    cache.set('b', createResponse(), 100);

    clock.advance(10_000);

    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
  });

  it('should delete and clear entries', () => {
    const cache = new ResponseCache();
    cache.set('a', createResponse());
    cache.set('b', createResponse());

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);

    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.getStats().hits).toBe(0);
  });

  it('should report updates to the callback', () => {
    const onUpdate = vi.fn();
    const cache = new ResponseCache({ onUpdate });

    cache.get('a');
    cache.set('a', createResponse());
    cache.get('a');

    expect(onUpdate.mock.calls.map(([event]) => event)).toEqual([
      { type: 'miss', key: 'a' },
      { type: 'set', key: 'a' },
      { type: 'hit', key: 'a' },
    ]);
  });
});
