/**
 * Qdrant Module
 *
 * Vector store capability backed by Qdrant.
 */

export {
  QdrantDistance,
  QdrantDistanceSchema,
  QdrantConfigSchema,
  type QdrantConfig,
  type QdrantConfigInput,
  createDefaultQdrantConfig,
  parseQdrantConfig,
  loadQdrantConfig,
} from './config.js';

export {
  QdrantClient,
  createQdrantClient,
  checkClusterHealth,
  type ClusterHealthResult,
} from './client.js';

export {
  VectorStoreErrorCode,
  VectorStoreError,
  isVectorStoreError,
  LegalRecordPayloadSchema,
  type LegalRecordPayload,
  type LegalRecordPayloadInput,
  type RetrievedDocument,
  toRetrievedDocument,
  SearchOptionsSchema,
  type SearchOptions,
  type EnsureCollectionOptions,
  type EnsureCollectionResult,
  type DocumentPoint,
  UpsertOptionsSchema,
  type UpsertOptions,
  type UpsertResult,
  type VectorStore,
  generatePointId,
} from './types.js';

export { QdrantVectorStore, type QdrantClientLike } from './vector-store.js';
