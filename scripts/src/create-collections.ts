/**
 * Create Legal Collections Script
 *
 * Creates the QA and document collections in Qdrant with a full-text index
 * on `content` and a keyword index on `record_id`. Existing collections are
 * left as they are.
 *
 * Usage:
 *   npm run build && npm run create-collections
 *
 * Environment variables:
 *   - QDRANT_URL, QDRANT_API_KEY
 *   - QDRANT_QA_COLLECTION, QDRANT_DOC_COLLECTION
 *   - QDRANT_VECTOR_SIZE (or EMBEDDING_DIMENSIONS), QDRANT_DISTANCE
 */

import {
  QdrantVectorStore,
  checkClusterHealth,
  createLogger,
  createQdrantClient,
  loadLoggerConfig,
  loadQdrantConfig,
} from '../../lib/src/index.js';

async function main(): Promise<number> {
  const logger = createLogger('create-collections', loadLoggerConfig());
  const config = loadQdrantConfig();
  const client = createQdrantClient(config);

  const health = await checkClusterHealth(client);
  if (!health.healthy) {
    logger.error('Qdrant cluster is not reachable', undefined, {
      url: config.url,
      reason: health.error,
    });
    return 1;
  }
  logger.info('Connected to Qdrant', {
    url: config.url,
    collections: health.collectionsCount,
  });

  const store = new QdrantVectorStore(client, logger);
  let failed = false;
  for (const collection of [config.qaCollection, config.docCollection]) {
    const result = await store.ensureCollection(collection, {
      vectorSize: config.vectorSize,
      distance: config.distance,
      onDiskPayload: config.onDiskPayload,
    });
    if (result.dimensionMismatch) {
      failed = true;
    }
  }

  if (failed) {
    logger.error('Recreate the mismatched collections or change QDRANT_VECTOR_SIZE');
    return 1;
  }
  logger.info('Collections are ready', {
    qaCollection: config.qaCollection,
    docCollection: config.docCollection,
    vectorSize: config.vectorSize,
  });
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    createLogger('create-collections').error('Unexpected error', error);
    process.exitCode = 1;
  }
);
