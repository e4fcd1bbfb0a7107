/**
 * Unit Tests for embedding types and schemas
 */

import { describe, it, expect } from 'vitest';
import {
  EmbeddingError,
  EmbeddingProviderConfigSchema,
  isValidEmbedding,
  normalizeVector,
} from '../../lib/src/embeddings/index.js';

describe('EmbeddingProviderConfigSchema', () => {
  it('should apply defaults to the service provider', () => {
    const config = EmbeddingProviderConfigSchema.parse({
      provider: 'docker',
      serviceUrl: 'http://embedding:8000/embed',
    });

    expect(config).toEqual({
      provider: 'docker',
      serviceUrl: 'http://embedding:8000/embed',
      dimensions: 1024,
      batchSize: 32,
      timeoutMs: 15000,
      normalize: false,
      enableCache: true,
      maxCacheSize: 1000,
    });
  });

  it('should reject unknown providers', () => {
    expect(
      EmbeddingProviderConfigSchema.safeParse({ provider: 'bedrock', serviceUrl: 'http://x' })
        .success
    ).toBe(false);
  });

  it('should require an API key for hosted providers', () => {
    expect(EmbeddingProviderConfigSchema.safeParse({ provider: 'openai_embedding' }).success).toBe(
      false
    );
  });
});

describe('EmbeddingError', () => {
  it('should keep an existing EmbeddingError', () => {
    const error = new EmbeddingError('bad', 'INVALID_RESPONSE');
    expect(EmbeddingError.fromError(error)).toBe(error);
  });

  it('should wrap other errors with the given code', () => {
    const wrapped = EmbeddingError.fromError(new Error('socket hang up'), 'REQUEST_FAILED');

    expect(wrapped.code).toBe('REQUEST_FAILED');
    expect(wrapped.message).toBe('socket hang up');
    expect(wrapped.cause).toBeInstanceOf(Error);
  });
});

describe('vector helpers', () => {
  it('should normalize to unit length', () => {
    expect(normalizeVector([3, 4])).toEqual([0.6, 0.8]);
    expect(normalizeVector([0, 0])).toEqual([0, 0]);
  });

  it('should validate length and finiteness', () => {
    expect(isValidEmbedding([1, 2, 3], 3)).toBe(true);
    expect(isValidEmbedding([1, 2], 3)).toBe(false);
    expect(isValidEmbedding([1, Number.NaN, 3], 3)).toBe(false);
  });
});
