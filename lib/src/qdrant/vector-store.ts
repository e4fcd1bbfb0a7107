/**
 * Qdrant Vector Store
 *
 * VectorStore implementation over @qdrant/js-client-rest. Points carry a
 * generated UUID as their id and the record id in the payload.
 */

import type { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';

import {
  type DocumentPoint,
  type EnsureCollectionOptions,
  type EnsureCollectionResult,
  type RetrievedDocument,
  type SearchOptions,
  type UpsertOptions,
  type UpsertResult,
  type VectorStore,
  LegalRecordPayloadSchema,
  SearchOptionsSchema,
  UpsertOptionsSchema,
  VectorStoreError,
  VectorStoreErrorCode,
  generatePointId,
  toRetrievedDocument,
} from './types.js';
import { RAGErrorCode } from '../errors/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

export type QdrantClientLike = Pick<
  QdrantClient,
  | 'search'
  | 'scroll'
  | 'collectionExists'
  | 'getCollection'
  | 'createCollection'
  | 'createPayloadIndex'
  | 'upsert'
>;

const DEFAULT_DUPLICATE_THRESHOLD = 0.9999;

const VectorParamsSchema = z.object({ size: z.number().int() });

export class QdrantVectorStore implements VectorStore {
  private readonly logger: Logger;

  constructor(
    private readonly client: QdrantClientLike,
    logger?: Logger
  ) {
    this.logger = (logger ?? getGlobalLogger()).child('QdrantVectorStore');
  }

  // ===========================================================================
  // Search Operations
  // ===========================================================================

  /**
   * Similarity search. With `keywords`, a hit must match at least one of them
   * in its `content` (full-text match).
   *
   * Points whose payload does not validate are skipped.
   *
   * @throws {VectorStoreError} if the request fails
   */
  async search(
    collection: string,
    vector: number[],
    options?: SearchOptions
  ): Promise<RetrievedDocument[]> {
    const { limit, keywords, scoreThreshold } = SearchOptionsSchema.parse(options ?? {});

    const params: Parameters<QdrantClient['search']>[1] = {
      vector,
      limit,
      with_payload: true,
    };
    if (scoreThreshold !== undefined) {
      params.score_threshold = scoreThreshold;
    }
    if (keywords && keywords.length > 0) {
      params.filter = {
        should: keywords.map((text) => ({ key: 'content', match: { text } })),
      };
    }

    let hits: Awaited<ReturnType<QdrantClient['search']>>;
    try {
      hits = await this.client.search(collection, params);
    } catch (error) {
      throw VectorStoreError.fromError(error, VectorStoreErrorCode.SEARCH_FAILED);
    }

    const documents: RetrievedDocument[] = [];
    for (const hit of hits) {
      const parsed = LegalRecordPayloadSchema.safeParse(hit.payload ?? {});
      if (!parsed.success) {
        this.logger.warn('Skipping point with invalid payload', {
          collection,
          pointId: hit.id,
          code: RAGErrorCode.DATA_ERROR,
          error: `Invalid payload on point ${String(hit.id)}`,
          issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
        });
        continue;
      }
      documents.push(toRetrievedDocument(parsed.data, hit.score));
    }

    this.logger.debug('Search completed', {
      collection,
      limit,
      keywordCount: keywords?.length ?? 0,
      hits: documents.length,
    });
    return documents;
  }

  async isDuplicate(
    collection: string,
    vector: number[],
    threshold: number = DEFAULT_DUPLICATE_THRESHOLD
  ): Promise<boolean> {
    try {
      const [top] = await this.client.search(collection, {
        vector,
        limit: 1,
        with_payload: false,
      });
      return top !== undefined && top.score >= threshold;
    } catch (error) {
      throw VectorStoreError.fromError(error, VectorStoreErrorCode.SEARCH_FAILED);
    }
  }

  /**
   * Whether a point with the given record id is stored
   */
  async pointExists(collection: string, recordId: string): Promise<boolean> {
    try {
      const { points } = await this.client.scroll(collection, {
        filter: { must: [{ key: 'record_id', match: { value: recordId } }] },
        limit: 1,
        with_payload: false,
        with_vector: false,
      });
      return points.length > 0;
    } catch (error) {
      throw VectorStoreError.fromError(error, VectorStoreErrorCode.SEARCH_FAILED);
    }
  }

  // ===========================================================================
  // Collection Management
  // ===========================================================================

  async collectionExists(collection: string): Promise<boolean> {
    try {
      const { exists } = await this.client.collectionExists(collection);
      return exists;
    } catch (error) {
      throw VectorStoreError.fromError(error, VectorStoreErrorCode.CONNECTION_ERROR);
    }
  }

  /**
   * Create the collection with a full-text index on `content` and a keyword
   * index on `record_id`. An existing collection is left untouched; a
   * dimension mismatch is logged and reported.
   */
  async ensureCollection(
    collection: string,
    options: EnsureCollectionOptions
  ): Promise<EnsureCollectionResult> {
    if (await this.collectionExists(collection)) {
      const actual = await this.readVectorSize(collection);
      if (actual !== undefined && actual !== options.vectorSize) {
        this.logger.error('Collection exists with a different vector size', {
          collection,
          expected: options.vectorSize,
          actual,
        });
        return {
          created: false,
          dimensionMismatch: { expected: options.vectorSize, actual },
        };
      }
      this.logger.info('Collection already exists', { collection });
      return { created: false };
    }

    try {
      await this.client.createCollection(collection, {
        vectors: { size: options.vectorSize, distance: options.distance },
        on_disk_payload: options.onDiskPayload ?? true,
      });
      await this.client.createPayloadIndex(collection, {
        field_name: 'content',
        field_schema: 'text',
        wait: true,
      });
      await this.client.createPayloadIndex(collection, {
        field_name: 'record_id',
        field_schema: 'keyword',
        wait: true,
      });
    } catch (error) {
      throw VectorStoreError.fromError(error, VectorStoreErrorCode.CONNECTION_ERROR);
    }

    this.logger.info('Collection created', {
      collection,
      vectorSize: options.vectorSize,
      distance: options.distance,
    });
    return { created: true };
  }

  private async readVectorSize(collection: string): Promise<number | undefined> {
    try {
      const info = await this.client.getCollection(collection);
      const parsed = VectorParamsSchema.safeParse(info.config.params.vectors);
      return parsed.success ? parsed.data.size : undefined;
    } catch (error) {
      throw VectorStoreError.fromError(error, VectorStoreErrorCode.COLLECTION_NOT_FOUND);
    }
  }

  // ===========================================================================
  // Upsert Operations
  // ===========================================================================

  /**
   * Write points in `batchSize` requests. Payloads are validated before the
   * first request.
   *
   * @throws {VectorStoreError} on an invalid payload, an empty vector or a
   *   failed request
   */
  async upsertDocuments(
    collection: string,
    points: DocumentPoint[],
    options?: UpsertOptions
  ): Promise<UpsertResult> {
    const { batchSize, wait } = UpsertOptionsSchema.parse(options ?? {});

    const prepared = points.map((point, index) => {
      const parsed = LegalRecordPayloadSchema.safeParse(point.payload);
      if (!parsed.success) {
        throw new VectorStoreError(
          `Invalid payload at index ${index}: ${parsed.error.errors
            .map((e) => `${e.path.join('.')}: ${e.message}`)
            .join(', ')}`,
          VectorStoreErrorCode.UPSERT_FAILED
        );
      }
      if (point.vector.length === 0) {
        throw new VectorStoreError(
          `Empty vector for record ${parsed.data.record_id}`,
          VectorStoreErrorCode.DIMENSION_MISMATCH
        );
      }
      return { id: generatePointId(), vector: point.vector, payload: parsed.data };
    });

    let upserted = 0;
    for (let i = 0; i < prepared.length; i += batchSize) {
      const batch = prepared.slice(i, i + batchSize);
      try {
        await this.client.upsert(collection, { wait, points: batch });
      } catch (error) {
        throw new VectorStoreError(
          `Upsert failed after ${upserted} of ${prepared.length} points`,
          VectorStoreErrorCode.UPSERT_FAILED,
          error instanceof Error ? { cause: error } : undefined
        );
      }
      upserted += batch.length;
    }

    this.logger.info('Points upserted', { collection, upserted });
    return { upserted, pointIds: prepared.map((p) => p.id) };
  }
}
