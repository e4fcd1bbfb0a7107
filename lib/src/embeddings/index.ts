/**
 * Embeddings Module
 *
 * Query embedding providers behind the `EmbeddingProvider` capability.
 *
 * @example
 * ```typescript
 * import { createEmbeddingProvider } from 'vn-legal-rag';
 *
 * const embedder = createEmbeddingProvider({
 *   provider: 'api',
 *   serviceUrl: 'http://localhost:8000/embed',
 *   dimensions: 1024,
 * });
 * const vector = await embedder.embed('Thời hiệu khởi kiện vụ án dân sự');
 * if (vector.length === 0) {
 *   // no embedding produced
 * }
 * ```
 */

export {
  EmbeddingProviderName,
  EmbeddingProviderNameSchema,
  EmbeddingBaseConfigSchema,
  ServiceEmbeddingConfigSchema,
  type ServiceEmbeddingConfig,
  OpenAIEmbeddingConfigSchema,
  type OpenAIEmbeddingConfig,
  GeminiEmbeddingConfigSchema,
  type GeminiEmbeddingConfig,
  OllamaEmbeddingConfigSchema,
  type OllamaEmbeddingConfig,
  EmbeddingProviderConfigSchema,
  type EmbeddingProviderConfig,
  type EmbeddingProviderConfigInput,
  type EmbeddingProvider,
  EmbeddingErrorCode,
  EmbeddingError,
  isEmbeddingError,
  normalizeVector,
  isValidEmbedding,
} from './types.js';

export {
  EmbeddingCacheConfigSchema,
  type EmbeddingCacheConfig,
  type EmbeddingCacheConfigInput,
  type EmbeddingCacheStats,
  EmbeddingCache,
  generateCacheKey,
} from './cache.js';

export {
  BaseEmbedder,
  type EmbedderOptions,
  type EmbedderHttpSettings,
} from './base-embedder.js';

export { ServiceEmbedder } from './service-embedder.js';
export { OpenAIEmbedder } from './openai-embedder.js';
export { GeminiEmbedder } from './gemini-embedder.js';
export { OllamaEmbedder } from './ollama-embedder.js';

export { createEmbeddingProvider, parseEmbeddingProviderConfig } from './factory.js';
