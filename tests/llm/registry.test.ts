/**
 * Unit Tests for the LLM adapter factory and provider registry
 */

import { describe, it, expect, vi } from 'vitest';
import type { AxiosInstance } from 'axios';
import {
  createLLMAdapter,
  parseLLMProviderConfig,
} from '../../lib/src/llm/factory.js';
import {
  LLMProviderRegistry,
  LLMSettingsSchema,
  createLLMProviderRegistry,
} from '../../lib/src/llm/registry.js';
import { OpenAICompatibleAdapter } from '../../lib/src/llm/adapters/openai-compatible.js';
import { GeminiAdapter } from '../../lib/src/llm/adapters/gemini.js';
import { OllamaAdapter } from '../../lib/src/llm/adapters/ollama.js';
import { ConfigurationError } from '../../lib/src/errors/index.js';
import { createCapturingLogger } from '../fixtures/logger.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const httpClient = { post: vi.fn() } as unknown as AxiosInstance;

const groqConfig = {
  provider: 'groq' as const,
  model: 'llama-3.3-70b-versatile',
  apiKey: 'test-api-key',
};
const ollamaConfig = { provider: 'ollama' as const, model: 'qwen2.5:7b' };

// =============================================================================
// Factory
// =============================================================================

describe('createLLMAdapter', () => {
  it('should build the adapter for each provider tag', () => {
    expect(createLLMAdapter(groqConfig, { httpClient })).toBeInstanceOf(OpenAICompatibleAdapter);
    expect(
      createLLMAdapter(
        { provider: 'google_gemini', model: 'gemini-1.5-flash', apiKey: 'test-api-key' },
        { httpClient }
      )
    ).toBeInstanceOf(GeminiAdapter);
    expect(createLLMAdapter(ollamaConfig, { httpClient })).toBeInstanceOf(OllamaAdapter);
  });

  it('should apply schema defaults', () => {
    const adapter = createLLMAdapter(groqConfig, { httpClient });

    expect(adapter.getConfig()).toEqual({
      ...groqConfig,
      baseUrl: 'https://api.groq.com/openai/v1',
      maxTokens: 2048,
      temperature: 0.3,
      timeoutMs: 60000,
    });
  });
});

describe('parseLLMProviderConfig', () => {
  it('should throw ConfigurationError listing the issues', () => {
    const parse = () => parseLLMProviderConfig({ provider: 'openai', model: 'gpt-4o-mini' });

    expect(parse).toThrow(ConfigurationError);
    expect(parse).toThrow('Invalid LLM configuration: apiKey: Required');
  });

  it('should reject unknown providers', () => {
    expect(() => parseLLMProviderConfig({ provider: 'mistral', model: 'x' })).toThrow(
      ConfigurationError
    );
  });
});

// =============================================================================
// Registry
// =============================================================================

describe('LLMProviderRegistry', () => {
  const buildRegistry = () => {
    const { logger, entries } = createCapturingLogger();
    const registry = new LLMProviderRegistry(
      [createLLMAdapter(groqConfig, { httpClient }), createLLMAdapter(ollamaConfig, { httpClient })],
      'groq',
      logger
    );
    return { registry, entries };
  };

  it('should use the default when no provider is requested', () => {
    const { registry } = buildRegistry();

    const resolved = registry.resolve();

    expect(resolved.provider).toBe('groq');
    expect(resolved.fellBack).toBe(false);
  });

  it('should honour a configured override, ignoring case', () => {
    const { registry } = buildRegistry();

    const resolved = registry.resolve(' Ollama ');

    expect(resolved.provider).toBe('ollama');
    expect(resolved.adapter.model).toBe('qwen2.5:7b');
    expect(resolved.fellBack).toBe(false);
  });

  it('should fall back with a warning for unknown or unconfigured overrides', () => {
    const { registry, entries } = buildRegistry();

    expect(registry.resolve('mistral')).toMatchObject({ provider: 'groq', fellBack: true });
    expect(registry.resolve('anthropic')).toMatchObject({ provider: 'groq', fellBack: true });
    expect(entries.map((e) => e.message)).toEqual([
      'Requested LLM provider is not configured, using default',
      'Requested LLM provider is not configured, using default',
    ]);
  });

  it('should throw ConfigurationError when the default is unavailable', () => {
    const { logger } = createCapturingLogger();
    const registry = new LLMProviderRegistry(
      [createLLMAdapter(ollamaConfig, { httpClient })],
      'groq',
      logger
    );

    expect(registry.isReady()).toBe(false);
    expect(() => registry.resolve()).toThrow(ConfigurationError);
    expect(() => registry.resolve('ollama')).not.toThrow();
  });
});

describe('createLLMProviderRegistry', () => {
  it('should build adapters for every configured provider', () => {
    const { logger } = createCapturingLogger();
    const settings = LLMSettingsSchema.parse({
      defaultProvider: 'ollama',
      providers: [groqConfig, ollamaConfig],
    });

    const registry = createLLMProviderRegistry(settings, { httpClient, logger });

    expect(registry.listProviders()).toEqual(['groq', 'ollama']);
    expect(registry.isReady()).toBe(true);
  });

  it('should warn when the default provider is missing', () => {
    const { logger, entries } = createCapturingLogger();

    const registry = createLLMProviderRegistry(LLMSettingsSchema.parse({}), { httpClient, logger });

    expect(registry.isReady()).toBe(false);
    expect(entries.map((e) => e.message)).toContain('Default LLM provider is unavailable');
  });
});
