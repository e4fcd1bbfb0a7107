/**
 * Unit Tests for application configuration loading
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  loadAppConfig,
  loadPromptTemplate,
  parseAppConfig,
} from '../../lib/src/config/index.js';
import { DEFAULT_PROMPT_TEMPLATE } from '../../lib/src/rag/index.js';
import { ConfigurationError } from '../../lib/src/errors/index.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const BASE_ENV = {
  GROQ_API_KEY: 'test-api-key',
  EMBEDDING_SERVICE_URL: 'http://localhost:8000/embed',
};

// =============================================================================
// loadAppConfig
// =============================================================================

describe('loadAppConfig', () => {
  it('should build a configuration with defaults from a minimal environment', () => {
    const config = loadAppConfig(BASE_ENV);

    expect(config.llm).toEqual({
      defaultProvider: 'groq',
      providers: [
        {
          provider: 'groq',
          apiKey: 'test-api-key',
          model: 'llama-3.3-70b-versatile',
          baseUrl: 'https://api.groq.com/openai/v1',
          maxTokens: 2048,
          temperature: 0.3,
          timeoutMs: 60000,
        },
      ],
    });
    expect(config.embedding).toMatchObject({
      provider: 'api',
      serviceUrl: 'http://localhost:8000/embed',
    });
    expect(config.qdrant.url).toBe('http://localhost:6333');
    expect(config.rerank).toEqual({ provider: 'none' });
    expect(config.queryStore.backend).toBe('memory');
    expect(config.pipeline.retrieval).toEqual({
      mode: 'dual',
      qaCollection: 'legal_qa',
      docCollection: 'legal_doc',
      qaTopK: 3,
      docTopK: 6,
      topK: 6,
    });
    expect(config.pipeline.maxContextChars).toBe(8000);
    expect(config.cache).toEqual({ enabled: true, maxSize: 100, ttlSeconds: 1800 });
    expect(config.promptFile).toBeUndefined();
  });

  it('should configure Ollama as the default provider', () => {
    const config = loadAppConfig({
      ...BASE_ENV,
      LLM_PROVIDER: 'Ollama',
      OLLAMA_MODEL: 'qwen2.5:14b',
      LLM_TEMPERATURE: '0',
    });

    expect(config.llm.defaultProvider).toBe('ollama');
    expect(config.llm.providers.map((p) => p.provider)).toEqual(['groq', 'ollama']);
    expect(config.llm.providers[1]).toMatchObject({
      provider: 'ollama',
      model: 'qwen2.5:14b',
      baseUrl: 'http://localhost:11434',
      temperature: 0,
    });
  });

  it('should read retrieval, keyword and cache settings', () => {
    const config = loadAppConfig({
      ...BASE_ENV,
      RAG_RETRIEVAL_MODE: 'single',
      RAG_TOP_K: '4',
      RAG_ENABLE_KEYWORDS: 'yes',
      RAG_ENABLE_INTENT_DETECTION: 'on',
      RAG_CACHE_ENABLED: 'false',
      RAG_CACHE_TTL_SECONDS: '60',
      QDRANT_QA_COLLECTION: 'qa_v2',
    });

    expect(config.pipeline.retrieval).toMatchObject({
      mode: 'single',
      topK: 4,
      qaCollection: 'qa_v2',
    });
    expect(config.pipeline.enableKeywords).toBe(true);
    expect(config.pipeline.enableIntentDetection).toBe(true);
    expect(config.cache).toEqual({ enabled: false, maxSize: 100, ttlSeconds: 60 });
  });

  it('should configure the HTTP reranker', () => {
    const config = loadAppConfig({
      ...BASE_ENV,
      RERANK_PROVIDER: 'http',
      RERANK_URL: 'http://localhost:9000/rerank',
      RERANK_API_KEY: 'test-api-key',
    });

    expect(config.rerank).toMatchObject({
      provider: 'http',
      url: 'http://localhost:9000/rerank',
      apiKey: 'test-api-key',
    });
  });

  it('should select an OpenAI embedding provider', () => {
    const config = loadAppConfig({
      OPENAI_API_KEY: 'test-api-key',
      LLM_PROVIDER: 'openai',
      EMBEDDING_PROVIDER: 'openai_embedding',
    });

    expect(config.embedding).toMatchObject({
      provider: 'openai_embedding',
      apiKey: 'test-api-key',
      model: 'text-embedding-3-small',
    });
  });

  it('should reject an embedding service without a URL', () => {
    expect(() => loadAppConfig({ GROQ_API_KEY: 'test-api-key' })).toThrow(ConfigurationError);
    expect(() => loadAppConfig({ GROQ_API_KEY: 'test-api-key' })).toThrow(
      /embedding\.serviceUrl/
    );
  });

  it('should require DATABASE_URL for the postgres query store', () => {
    expect(() => loadAppConfig({ ...BASE_ENV, QUERY_STORE: 'postgres' })).toThrow(
      'queryStore.databaseUrl: DATABASE_URL is required for the postgres query store'
    );
  });

  it('should reject a non-numeric top-k', () => {
    expect(() => loadAppConfig({ ...BASE_ENV, RAG_QA_TOP_K: 'three' })).toThrow(
      /pipeline\.retrieval\.qaTopK/
    );
  });
});

describe('parseAppConfig', () => {
  it('should list every violation', () => {
    try {
      parseAppConfig({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message.startsWith('Invalid application configuration: ')).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith('embedding'))).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith('llm'))).toBe(true);
      }
    }
  });
});

// =============================================================================
// loadPromptTemplate
// =============================================================================

describe('loadPromptTemplate', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prompt-template-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should override only the prompts present in the file', async () => {
    const path = join(dir, 'prompts.json');
    await writeFile(path, JSON.stringify({ systemPrompt: 'Bạn là trợ lý pháp lý.' }));

    const template = await loadPromptTemplate(path);

    expect(template.systemPrompt).toBe('Bạn là trợ lý pháp lý.');
    expect(template.userPrompt).toBe(DEFAULT_PROMPT_TEMPLATE.userPrompt);
  });

  it('should reject unknown keys', async () => {
    const path = join(dir, 'prompts.json');
    await writeFile(path, JSON.stringify({ sytemPrompt: 'typo' }));

    await expect(loadPromptTemplate(path)).rejects.toThrow(`Invalid prompt file '${path}'`);
  });

  it('should reject a file that is not JSON', async () => {
    const path = join(dir, 'prompts.json');
    await writeFile(path, 'systemPrompt: yaml');

    await expect(loadPromptTemplate(path)).rejects.toThrow('is not valid JSON');
  });

  it('should reject a missing file', async () => {
    await expect(loadPromptTemplate(join(dir, 'missing.json'))).rejects.toThrow(
      'Cannot read prompt file'
    );
  });
});
