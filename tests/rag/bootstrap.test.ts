/**
 * Unit Tests for createQueryServiceFromConfig
 *
 * Only start-up failures are covered; they occur before any network call.
 */

import { describe, it, expect, vi } from 'vitest';
import { createQueryServiceFromConfig } from '../../lib/src/rag/index.js';
import { loadAppConfig } from '../../lib/src/config/index.js';
import { InMemoryQueryStore } from '../../lib/src/store/index.js';
import { ConfigurationError } from '../../lib/src/errors/index.js';
import { silentLogger } from '../fixtures/logger.js';

// =============================================================================
// Mock Setup
// =============================================================================

vi.mock('@qdrant/js-client-rest', () => {
  class QdrantClient {
    getCollections = vi.fn();
    collectionExists = vi.fn();
    search = vi.fn();
  }
  return { QdrantClient };
});

describe('createQueryServiceFromConfig', () => {
  it('should refuse to start without the default LLM provider', async () => {
    const config = loadAppConfig({
      EMBEDDING_SERVICE_URL: 'http://localhost:8000/embed',
      OLLAMA_MODEL: 'qwen2.5:7b',
    });

    await expect(createQueryServiceFromConfig(config, { logger: silentLogger })).rejects.toThrow(
      "Default LLM provider 'groq' is not configured"
    );
  });

  it('should refuse to start with an unreadable prompt file', async () => {
    const config = loadAppConfig({
      GROQ_API_KEY: 'test-api-key',
      EMBEDDING_SERVICE_URL: 'http://localhost:8000/embed',
      RAG_PROMPT_FILE: '/nonexistent/prompts.json',
    });

    await expect(
      createQueryServiceFromConfig(config, { logger: silentLogger })
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should close the query store when the service cannot be built', async () => {
    const close = vi.spyOn(InMemoryQueryStore.prototype, 'close');
    const config = loadAppConfig({
      GROQ_API_KEY: 'test-api-key',
      EMBEDDING_SERVICE_URL: 'http://localhost:8000/embed',
      RAG_CITATION_PATTERN: '[unclosed',
    });

    await expect(createQueryServiceFromConfig(config, { logger: silentLogger })).rejects.toThrow(
      "Invalid citation pattern '[unclosed'"
    );
    expect(close).toHaveBeenCalledOnce();
    close.mockRestore();
  });
});
