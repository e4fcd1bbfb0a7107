/**
 * Rerank Module
 */

export {
  type RerankPassageMeta,
  type RerankPassage,
  type RerankedPassage,
  type Reranker,
  RerankProviderName,
  DEFAULT_RERANK_PROMPT,
  NoRerankConfigSchema,
  LLMRerankConfigSchema,
  HttpRerankConfigSchema,
  RerankConfigSchema,
  type LLMRerankConfig,
  type HttpRerankConfig,
  type RerankConfig,
  type RerankConfigInput,
  RerankErrorCode,
  RerankError,
  isRerankError,
} from './types.js';

export { toRerankPassages, fromRerankPassages, sortByScore } from './mapping.js';
export { LLMReranker, parseRelevanceScore } from './llm-reranker.js';
export { HttpReranker, type HttpRerankerOptions } from './http-reranker.js';
export { parseRerankConfig, createReranker, type RerankerDependencies } from './factory.js';
