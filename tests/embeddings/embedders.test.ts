/**
 * Unit Tests for the embedding providers
 *
 * HTTP clients are stubbed; no embedding service is contacted.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AxiosError, AxiosHeaders, type AxiosInstance } from 'axios';
import {
  GeminiEmbedder,
  OllamaEmbedder,
  OpenAIEmbedder,
  ServiceEmbedder,
  createEmbeddingProvider,
  GeminiEmbeddingConfigSchema,
  OllamaEmbeddingConfigSchema,
  OpenAIEmbeddingConfigSchema,
  ServiceEmbeddingConfigSchema,
} from '../../lib/src/embeddings/index.js';
import { ConfigurationError } from '../../lib/src/errors/index.js';
import { createCapturingLogger, silentLogger } from '../fixtures/logger.js';

// =============================================================================
// Mock Setup
// =============================================================================

function createMockHttpClient() {
  const post = vi.fn();
  return { post, client: { post } as unknown as AxiosInstance };
}

const vec = (...values: number[]) => values;

const serviceConfig = (overrides: Record<string, unknown> = {}) =>
  ServiceEmbeddingConfigSchema.parse({
    provider: 'api',
    serviceUrl: 'http://localhost:8000/embed',
    dimensions: 3,
    ...overrides,
  });

// =============================================================================
// Service embedder
// =============================================================================

describe('ServiceEmbedder', () => {
  let http: ReturnType<typeof createMockHttpClient>;

  beforeEach(() => {
    http = createMockHttpClient();
  });

  it('should post texts and return embeddings in order', async () => {
    http.post.mockResolvedValue({ data: { embeddings: [vec(1, 0, 0), vec(0, 1, 0)] } });
    const embedder = new ServiceEmbedder(serviceConfig(), {
      httpClient: http.client,
      logger: silentLogger,
    });

    const vectors = await embedder.batchEmbed(['Điều 1', 'Điều 2']);

    expect(http.post).toHaveBeenCalledWith('', { texts: ['Điều 1', 'Điều 2'] });
    expect(vectors).toEqual([vec(1, 0, 0), vec(0, 1, 0)]);
  });

  it('should return [] when the request fails', async () => {
    http.post.mockRejectedValue(
      new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, {
        status: 500,
        statusText: 'Internal Server Error',
        data: {},
        headers: {},
        config: { headers: new AxiosHeaders() },
      })
    );
    const { logger, entries } = createCapturingLogger();
    const embedder = new ServiceEmbedder(serviceConfig(), { httpClient: http.client, logger });

    const vector = await embedder.embed('Điều 1');

    expect(vector).toEqual([]);
    expect(entries).toContainEqual(
      expect.objectContaining({ level: 'ERROR', message: 'Embedding request failed' })
    );
  });

  it('should reject vectors of the wrong dimension', async () => {
    http.post.mockResolvedValue({ data: { embeddings: [vec(1, 0)] } });
    const embedder = new ServiceEmbedder(serviceConfig(), {
      httpClient: http.client,
      logger: silentLogger,
    });

    await expect(embedder.embed('Điều 1')).resolves.toEqual([]);
  });

  it('should return [] for every text when the count does not match', async () => {
    http.post.mockResolvedValue({ data: { embeddings: [vec(1, 0, 0)] } });
    const embedder = new ServiceEmbedder(serviceConfig(), {
      httpClient: http.client,
      logger: silentLogger,
    });

    await expect(embedder.batchEmbed(['a', 'b'])).resolves.toEqual([[], []]);
  });

  it('should skip empty texts without calling the service', async () => {
    const embedder = new ServiceEmbedder(serviceConfig(), {
      httpClient: http.client,
      logger: silentLogger,
    });

    await expect(embedder.embed('   ')).resolves.toEqual([]);
    expect(http.post).not.toHaveBeenCalled();
  });

  it('should split requests by batchSize and keep order', async () => {
    http.post
      .mockResolvedValueOnce({ data: { embeddings: [vec(1, 0, 0), vec(2, 0, 0)] } })
      .mockResolvedValueOnce({ data: { embeddings: [vec(3, 0, 0)] } });
    const embedder = new ServiceEmbedder(serviceConfig({ batchSize: 2 }), {
      httpClient: http.client,
      logger: silentLogger,
    });

    const vectors = await embedder.batchEmbed(['a', 'b', 'c']);

    expect(http.post).toHaveBeenCalledTimes(2);
    expect(http.post).toHaveBeenLastCalledWith('', { texts: ['c'] });
    expect(vectors).toEqual([vec(1, 0, 0), vec(2, 0, 0), vec(3, 0, 0)]);
  });

  it('should serve repeated texts from the cache', async () => {
    http.post.mockResolvedValue({ data: { embeddings: [vec(1, 0, 0)] } });
    const embedder = new ServiceEmbedder(serviceConfig(), {
      httpClient: http.client,
      logger: silentLogger,
    });

    await embedder.embed('Điều 1');
    const second = await embedder.embed('Điều 1');

    expect(second).toEqual(vec(1, 0, 0));
    expect(http.post).toHaveBeenCalledTimes(1);
  });

  it('should normalize when configured', async () => {
    http.post.mockResolvedValue({ data: { embeddings: [vec(3, 4, 0)] } });
    const embedder = new ServiceEmbedder(serviceConfig({ normalize: true }), {
      httpClient: http.client,
      logger: silentLogger,
    });

    await expect(embedder.embed('x')).resolves.toEqual([0.6, 0.8, 0]);
  });

  it('should report initialization from a probe request', async () => {
    http.post.mockResolvedValueOnce({ data: { embeddings: [vec(1, 0, 0)] } });
    const embedder = new ServiceEmbedder(serviceConfig(), {
      httpClient: http.client,
      logger: silentLogger,
    });

    expect(embedder.isInitialized()).toBe(false);
    await expect(embedder.initialize()).resolves.toBe(true);
    expect(embedder.isInitialized()).toBe(true);

    http.post.mockRejectedValueOnce(new Error('down'));
    await expect(embedder.initialize()).resolves.toBe(false);
    expect(embedder.isInitialized()).toBe(false);
  });
});

// =============================================================================
// Hosted providers
// =============================================================================

describe('OpenAIEmbedder', () => {
  it('should reorder results by index', async () => {
    const http = createMockHttpClient();
    http.post.mockResolvedValue({
      data: {
        data: [
          { index: 1, embedding: vec(0, 1) },
          { index: 0, embedding: vec(1, 0) },
        ],
      },
    });
    const embedder = new OpenAIEmbedder(
      OpenAIEmbeddingConfigSchema.parse({
        provider: 'openai_embedding',
        apiKey: 'test-api-key',
        dimensions: 2,
      }),
      { httpClient: http.client, logger: silentLogger }
    );

    const vectors = await embedder.batchEmbed(['first', 'second']);

    expect(http.post).toHaveBeenCalledWith('/embeddings', {
      model: 'text-embedding-3-small',
      input: ['first', 'second'],
      dimensions: 2,
    });
    expect(vectors).toEqual([vec(1, 0), vec(0, 1)]);
  });
});

describe('GeminiEmbedder', () => {
  it('should call batchEmbedContents', async () => {
    const http = createMockHttpClient();
    http.post.mockResolvedValue({ data: { embeddings: [{ values: vec(0.5, 0.5) }] } });
    const embedder = new GeminiEmbedder(
      GeminiEmbeddingConfigSchema.parse({
        provider: 'google_gemini_embedding',
        apiKey: 'test-api-key',
        dimensions: 2,
      }),
      { httpClient: http.client, logger: silentLogger }
    );

    await expect(embedder.embed('Điều 3')).resolves.toEqual(vec(0.5, 0.5));
    expect(http.post).toHaveBeenCalledWith('/models/text-embedding-004:batchEmbedContents', {
      requests: [
        {
          model: 'models/text-embedding-004',
          content: { parts: [{ text: 'Điều 3' }] },
          taskType: 'RETRIEVAL_QUERY',
          outputDimensionality: 2,
        },
      ],
    });
  });
});

describe('OllamaEmbedder', () => {
  it('should call /api/embed', async () => {
    const http = createMockHttpClient();
    http.post.mockResolvedValue({ data: { model: 'bge-m3', embeddings: [vec(1, 1)] } });
    const embedder = new OllamaEmbedder(
      OllamaEmbeddingConfigSchema.parse({ provider: 'ollama_embedding', dimensions: 2 }),
      { httpClient: http.client, logger: silentLogger }
    );

    await expect(embedder.embed('Điều 4')).resolves.toEqual(vec(1, 1));
    expect(http.post).toHaveBeenCalledWith('/api/embed', { model: 'bge-m3', input: ['Điều 4'] });
  });
});

// =============================================================================
// Factory
// =============================================================================

describe('createEmbeddingProvider', () => {
  it('should map provider names to embedders', () => {
    const { client } = createMockHttpClient();
    const options = { httpClient: client, logger: silentLogger };

    expect(
      createEmbeddingProvider({ provider: 'ec2', serviceUrl: 'http://10.0.0.5/embed' }, options)
    ).toBeInstanceOf(ServiceEmbedder);
    expect(
      createEmbeddingProvider({ provider: 'ollama_embedding' }, options).name
    ).toBe('ollama_embedding');
  });

  it('should throw ConfigurationError for invalid settings', () => {
    expect(() => createEmbeddingProvider({ provider: 'api', serviceUrl: 'not a url' })).toThrow(
      ConfigurationError
    );
  });
});
