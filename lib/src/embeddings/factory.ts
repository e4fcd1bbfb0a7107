/**
 * Embedding provider factory. The provider set is closed; an unknown name
 * fails schema validation as a ConfigurationError.
 */

import {
  type EmbeddingProvider,
  type EmbeddingProviderConfig,
  type EmbeddingProviderConfigInput,
  EmbeddingProviderConfigSchema,
} from './types.js';
import type { EmbedderOptions } from './base-embedder.js';
import { ServiceEmbedder } from './service-embedder.js';
import { OpenAIEmbedder } from './openai-embedder.js';
import { GeminiEmbedder } from './gemini-embedder.js';
import { OllamaEmbedder } from './ollama-embedder.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * @throws {ConfigurationError} listing every schema violation
 */
export function parseEmbeddingProviderConfig(config: unknown): EmbeddingProviderConfig {
  const result = EmbeddingProviderConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.errors.map(
      (e) => `${e.path.join('.') || 'provider'}: ${e.message}`
    );
    throw new ConfigurationError(`Invalid embedding configuration: ${issues.join(', ')}`, {
      issues,
    });
  }
  return result.data;
}

export function createEmbeddingProvider(
  config: EmbeddingProviderConfigInput,
  options: EmbedderOptions = {}
): EmbeddingProvider {
  const validated = parseEmbeddingProviderConfig(config);

  switch (validated.provider) {
    case 'api':
    case 'docker':
    case 'ec2':
      return new ServiceEmbedder(validated, options);
    case 'openai_embedding':
      return new OpenAIEmbedder(validated, options);
    case 'google_gemini_embedding':
      return new GeminiEmbedder(validated, options);
    case 'ollama_embedding':
      return new OllamaEmbedder(validated, options);
    default: {
      const unreachable: never = validated;
      throw new ConfigurationError(`Unsupported embedding provider: ${String(unreachable)}`);
    }
  }
}
