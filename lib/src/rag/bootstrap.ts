/**
 * Service wiring: builds every collaborator once from the application
 * configuration.
 */

import { RAGQueryService } from './query-service.js';
import { ResponseCache } from './response-cache.js';
import { DEFAULT_PROMPT_TEMPLATE, type PromptTemplate } from './prompts.js';
import { type AppConfig, loadPromptTemplate } from '../config/index.js';
import { createLLMProviderRegistry } from '../llm/index.js';
import { createEmbeddingProvider } from '../embeddings/index.js';
import { QdrantVectorStore, createQdrantClient } from '../qdrant/index.js';
import { type RerankConfig, createReranker } from '../rerank/index.js';
import { createQueryStore } from '../store/index.js';
import { ConfigurationError } from '../errors/index.js';
import { type Logger, createLogger } from '../logging/index.js';

export interface CreateQueryServiceOptions {
  /** Defaults to a logger built from `config.logging` */
  logger?: Logger | undefined;
}

/**
 * Create and initialize the query service.
 *
 * @throws {ConfigurationError} if the default LLM provider cannot be
 *   created or a prompt file is invalid
 */
export async function createQueryServiceFromConfig(
  config: AppConfig,
  options: CreateQueryServiceOptions = {}
): Promise<RAGQueryService> {
  const logger = options.logger ?? createLogger('vn-legal-rag', config.logging);

  const promptTemplate: PromptTemplate = config.promptFile
    ? await loadPromptTemplate(config.promptFile)
    : DEFAULT_PROMPT_TEMPLATE;

  const llm = createLLMProviderRegistry(config.llm, { logger });
  if (!llm.isReady()) {
    throw new ConfigurationError(
      `Default LLM provider '${config.llm.defaultProvider}' is not configured`,
      { metadata: { available: llm.listProviders() } }
    );
  }

  const embedder = createEmbeddingProvider(config.embedding, { logger });
  const vectorStore = new QdrantVectorStore(createQdrantClient(config.qdrant), logger);

  const rerankConfig: RerankConfig =
    config.rerank.provider === 'llm'
      ? { ...config.rerank, prompt: promptTemplate.rerankPrompt }
      : config.rerank;
  const reranker = createReranker(rerankConfig, { llm: llm.resolve().adapter, logger });

  const queryStore = await createQueryStore(config.queryStore, logger);
  const cache = config.cache.enabled
    ? new ResponseCache({ maxSize: config.cache.maxSize, ttlSeconds: config.cache.ttlSeconds })
    : null;

  try {
    const service = new RAGQueryService(
      { embedder, vectorStore, llm, reranker, queryStore, cache, promptTemplate, logger },
      config.pipeline
    );
    await service.initialize();
    return service;
  } catch (error) {
    await queryStore.close();
    throw error;
  }
}
