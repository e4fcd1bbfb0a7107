/**
 * LLM Adapter Factory
 *
 * Builds the adapter for a validated provider configuration. The provider
 * set is closed, so dispatch is an exhaustive switch on the tag.
 */

import type { AxiosInstance } from 'axios';

import type { LLMAdapter, LLMAdapterOptions } from './adapter.js';
import {
  type LLMProviderConfig,
  type LLMProviderConfigInput,
  LLMProviderConfigSchema,
} from './types.js';
import { AnthropicAdapter } from './adapters/anthropic.js';
import { OpenAICompatibleAdapter } from './adapters/openai-compatible.js';
import { GeminiAdapter } from './adapters/gemini.js';
import { OllamaAdapter } from './adapters/ollama.js';
import { ConfigurationError } from '../errors/index.js';

export interface CreateLLMAdapterOptions extends LLMAdapterOptions {
  /** HTTP client for the REST-based adapters */
  httpClient?: AxiosInstance | undefined;
}

/**
 * Validate a provider configuration
 *
 * @throws {ConfigurationError} listing every schema violation
 */
export function parseLLMProviderConfig(config: unknown): LLMProviderConfig {
  const result = LLMProviderConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.errors.map(
      (e) => `${e.path.join('.') || 'provider'}: ${e.message}`
    );
    throw new ConfigurationError(`Invalid LLM configuration: ${issues.join(', ')}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Create an adapter for the given provider configuration.
 *
 * @example
 * ```typescript
 * const adapter = createLLMAdapter({
 *   provider: 'groq',
 *   model: 'llama-3.3-70b-versatile',
 *   apiKey: process.env.GROQ_API_KEY,
 * });
 * const response = await adapter.sendMessage('Điều 12 quy định gì?');
 * ```
 *
 * @throws {ConfigurationError} if the configuration does not validate
 */
export function createLLMAdapter(
  config: LLMProviderConfigInput,
  options: CreateLLMAdapterOptions = {}
): LLMAdapter {
  const validated = parseLLMProviderConfig(config);

  switch (validated.provider) {
    case 'anthropic':
      return new AnthropicAdapter(validated, options);
    case 'openai':
    case 'groq':
      return new OpenAICompatibleAdapter(validated, options);
    case 'google_gemini':
      return new GeminiAdapter(validated, options);
    case 'ollama':
      return new OllamaAdapter(validated, options);
    default: {
      const unreachable: never = validated;
      throw new ConfigurationError(`Unsupported LLM provider: ${String(unreachable)}`);
    }
  }
}
