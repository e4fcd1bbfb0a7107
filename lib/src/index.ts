/**
 * Vietnamese Legal RAG - Shared Library
 *
 * Query orchestration over Vietnamese legal corpora: embedding, dual
 * collection retrieval, reranking, grounded generation and citation checks.
 */

// Errors and capability calls
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Configuration
export * from './config/index.js';

// LLM (Language Model Adapters)
export * from './llm/index.js';

// Embeddings (Query Vectors)
export * from './embeddings/index.js';

// Qdrant (Vector Database)
export * from './qdrant/index.js';

// Citations and Source Reconstruction
export * from './citations/index.js';

// Reranking
export * from './rerank/index.js';

// Query Persistence
export * from './store/index.js';

// RAG (Retrieval-Augmented Generation Pipeline)
export * from './rag/index.js';
