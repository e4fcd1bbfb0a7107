/**
 * Qdrant Client
 *
 * Wraps @qdrant/js-client-rest with the project's configuration.
 */

import { QdrantClient } from '@qdrant/js-client-rest';

import type { QdrantConfig } from './config.js';

/**
 * Creates a new Qdrant client with the provided configuration.
 */
export function createQdrantClient(config: QdrantConfig): QdrantClient {
  return new QdrantClient({
    url: config.url,
    ...(config.apiKey !== undefined && { apiKey: config.apiKey }),
    timeout: config.timeout,
  });
}

/**
 * Cluster health check result
 */
export interface ClusterHealthResult {
  healthy: boolean;
  collectionsCount?: number;
  error?: string;
}

/**
 * Lists collections to verify the cluster answers.
 */
export async function checkClusterHealth(
  client: Pick<QdrantClient, 'getCollections'>
): Promise<ClusterHealthResult> {
  try {
    const { collections } = await client.getCollections();
    return { healthy: true, collectionsCount: collections.length };
  } catch (error) {
    return {
      healthy: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}

export { QdrantClient };
