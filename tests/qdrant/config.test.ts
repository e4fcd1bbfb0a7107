import { describe, it, expect, vi } from 'vitest';
import {
  createDefaultQdrantConfig,
  createQdrantClient,
  checkClusterHealth,
  loadQdrantConfig,
  QdrantClient,
} from '../../lib/src/qdrant/index.js';
import { ConfigurationError } from '../../lib/src/errors/index.js';

describe('Qdrant configuration', () => {
  it('should provide defaults for the legal collections', () => {
    expect(createDefaultQdrantConfig()).toEqual({
      url: 'http://localhost:6333',
      qaCollection: 'legal_qa',
      docCollection: 'legal_doc',
      vectorSize: 1024,
      distance: 'Cosine',
      onDiskPayload: true,
      timeout: 15000,
    });
  });

  it('should read environment variables', () => {
    const config = loadQdrantConfig({
      QDRANT_URL: 'https://qdrant.example.test:6333',
      QDRANT_API_KEY: 'test-api-key',
      QDRANT_QA_COLLECTION: 'qa_v2',
      QDRANT_DOC_COLLECTION: 'doc_v2',
      QDRANT_DISTANCE: 'euclidean',
      EMBEDDING_DIMENSIONS: '768',
      QDRANT_TIMEOUT: '5000',
    });

    expect(config).toMatchObject({
      url: 'https://qdrant.example.test:6333',
      apiKey: 'test-api-key',
      qaCollection: 'qa_v2',
      docCollection: 'doc_v2',
      distance: 'Euclid',
      vectorSize: 768,
      timeout: 5000,
    });
  });

  it('should prefer QDRANT_VECTOR_SIZE over EMBEDDING_DIMENSIONS', () => {
    expect(
      loadQdrantConfig({ QDRANT_VECTOR_SIZE: '384', EMBEDDING_DIMENSIONS: '768' }).vectorSize
    ).toBe(384);
  });

  it('should ignore empty variables', () => {
    expect(loadQdrantConfig({ QDRANT_URL: '', QDRANT_API_KEY: '' })).toMatchObject({
      url: 'http://localhost:6333',
      apiKey: undefined,
    });
  });

  it('should raise ConfigurationError for an unknown distance', () => {
    expect(() => loadQdrantConfig({ QDRANT_DISTANCE: 'hamming' })).toThrow(ConfigurationError);
  });

  it('should raise ConfigurationError for a malformed URL', () => {
    expect(() => loadQdrantConfig({ QDRANT_URL: 'not a url' })).toThrow(
      /^Invalid Qdrant configuration: url: /
    );
  });
});

describe('Qdrant client', () => {
  it('should create a QdrantClient', () => {
    expect(createQdrantClient(createDefaultQdrantConfig())).toBeInstanceOf(QdrantClient);
  });

  it('should report cluster health', async () => {
    const healthy = await checkClusterHealth({
      getCollections: vi.fn().mockResolvedValue({ collections: [{ name: 'legal_qa' }] }),
    });
    const down = await checkClusterHealth({
      getCollections: vi.fn().mockRejectedValue(new Error('ECONNREFUSED')),
    });

    expect(healthy).toEqual({ healthy: true, collectionsCount: 1 });
    expect(down).toEqual({ healthy: false, error: 'ECONNREFUSED' });
  });
});
